import { describe, it, expect } from "vitest";
import type { CheerioAPI } from "cheerio";
import { resolveConfig } from "../app/lib/config";
import { DocumentCache, loadXml } from "../app/lib/document/cache";
import { loadPackageDocument } from "../app/lib/epub/package-document";
import { layoutFilter } from "../app/lib/layout";
import { restructureFootnotes } from "../app/lib/layout/footnotes";
import { platformProfile } from "../app/lib/layout/platforms";
import { addTrackingSpans, splitSentences } from "../app/lib/layout/tracking";
import type { PackageStore } from "../app/lib/package/store";
import {
  CHAPTER_1,
  CHAPTER_2,
  CHAPTER_3,
  CONTAINER_XML,
  epub2Entries,
  snapshot,
  storeFrom,
  text,
} from "./helpers/fixtures";

function trackingIds($: CheerioAPI): string[] {
  return $("span.koboSpan")
    .toArray()
    .map((el) => el.attribs.id ?? "");
}

function isStrictlyIncreasing(ids: string[]): boolean {
  const keys = ids.map((id) => id.split(".").slice(1).map(Number));
  return keys.every((key, i) => {
    if (i === 0) return true;
    const [p, s] = keys[i - 1];
    return key[0] > p || (key[0] === p && key[1] > s);
  });
}

async function runLayout(store: PackageStore, platform: string) {
  const cache = new DocumentCache(store);
  await layoutFilter.run({ store, cache, config: resolveConfig({ overrides: { platform } }), options: {} });
}

describe("splitSentences", () => {
  it("splits after terminators and keeps the text intact", () => {
    const input = "Hello world. How are you? Fine!";
    const pieces = splitSentences(input);
    expect(pieces).toEqual(["Hello world. ", "How are you? ", "Fine!"]);
    expect(pieces.join("")).toBe(input);
  });

  it("handles CJK punctuation, runs of terminators and closing quotes", () => {
    expect(splitSentences("第一句。第二句！")).toEqual(["第一句。", "第二句！"]);
    expect(splitSentences("Wait... what?!")).toEqual(["Wait... ", "what?!"]);
    expect(splitSentences('"Quoted." Next')).toEqual(['"Quoted." ', "Next"]);
  });

  it("returns text without terminators whole", () => {
    expect(splitSentences("no terminator here")).toEqual(["no terminator here"]);
  });
});

describe("addTrackingSpans", () => {
  it("numbers paragraphs and sentences", () => {
    const $ = loadXml(CHAPTER_1);
    expect(addTrackingSpans($)).toBe(4);

    expect(trackingIds($)).toEqual(["kobo.1.1", "kobo.2.1", "kobo.2.2", "kobo.3.1"]);
    expect($('span[id="kobo.2.1"]').text()).toBe("It was a dark night. ");
    expect($('span[id="kobo.2.2"]').text()).toBe("The rain fell!");
    expect($("title").text()).toBe("Chapter One");
  });

  it("numbers existing spans in the same pass", () => {
    const $ = loadXml(
      '<html><body><p><span class="koboSpan" id="kobo.1.1">Old.</span> New text.</p></body></html>',
    );
    expect(addTrackingSpans($)).toBe(1);
    expect($("p").html()).toBe(
      '<span class="koboSpan" id="kobo.1.1">Old.</span> <span class="koboSpan" id="kobo.1.2">New text.</span>',
    );
  });

  it("keeps ids in document order when existing spans follow new text", () => {
    const $ = loadXml(
      '<html><body><p>New text.</p><p><span class="koboSpan" id="kobo.1.1">Old.</span></p></body></html>',
    );
    expect(addTrackingSpans($)).toBe(1);
    expect(trackingIds($)).toEqual(["kobo.1.1", "kobo.2.1"]);
    expect($('span[id="kobo.2.1"]').text()).toBe("Old.");
  });
});

describe("restructureFootnotes", () => {
  it("pairs a note reference with an aside after its block", () => {
    const $ = loadXml(CHAPTER_2);
    expect(restructureFootnotes($, platformProfile("generic"))).toBe(1);

    const anchor = $('[id="A_1"]');
    expect(anchor.attr("href")).toBe("#B_1");
    expect(anchor.attr("class")).toBe("footnote-ref");
    expect(anchor.html()).toBe('<span class="footnote-icon">1</span>');

    const aside = $("aside");
    expect(aside.attr("id")).toBe("B_1");
    expect(aside.attr("epub:type")).toBe("footnote");
    expect(aside.attr("class")).toBe("footnote");
    expect(aside.html()).toBe('<a href="#A_1">1</a> The note text.');
    expect(aside.prev().find('[id="A_1"]').length).toBe(1);

    expect($('[id="note-1"]').length).toBe(0);
    expect($("div.notes").length).toBe(0);
  });

  it("uses the platform classes and plain text for kindle and duokan", () => {
    const kindle = loadXml(CHAPTER_2);
    restructureFootnotes(kindle, platformProfile("kindle"));
    expect(kindle('[id="A_1"]').html()).toBe("<sup>1</sup>");

    const duokan = loadXml(CHAPTER_2);
    restructureFootnotes(duokan, platformProfile("duokan"));
    expect(duokan('[id="A_1"]').attr("class")).toBe("duokan-footnote");
    expect(duokan("aside").attr("class")).toBe("duokan-footnote-content");
  });

  it("keeps several notes of one block in reference order", () => {
    const $ = loadXml(
      "<html><body>" +
        '<p>A<a epub:type="noteref" href="#n1">1</a> B<a epub:type="noteref" href="#n2">2</a></p>' +
        '<p id="n1">First.</p><p id="n2">Second.</p>' +
        "</body></html>",
    );
    expect(restructureFootnotes($, platformProfile("generic"))).toBe(2);

    const order = $("body")
      .children()
      .toArray()
      .map((el) => el.attribs.id ?? el.name);
    expect(order).toEqual(["p", "B_1", "B_2"]);
    expect($('[id="B_2"]').text()).toBe("Second.");
  });

  it("skips references whose target is missing", () => {
    const $ = loadXml('<html><body><p>X<a epub:type="noteref" href="#nowhere">1</a></p></body></html>');
    expect(restructureFootnotes($, platformProfile("generic"))).toBe(0);
    expect($("a").attr("href")).toBe("#nowhere");
  });
});

describe("layout filter", () => {
  it("adds strictly increasing tracking ids and footnote pairs to spine documents", async () => {
    const store = await storeFrom(epub2Entries());
    await runLayout(store, "generic");

    const $ = loadXml(await text(store, "OEBPS/Text/chapter-2.xhtml"));
    const ids = trackingIds($);
    expect(ids).toEqual(["kobo.1.1", "kobo.2.1", "kobo.2.2", "kobo.2.3", "kobo.3.1", "kobo.3.2"]);
    expect(isStrictlyIncreasing(ids)).toBe(true);
    expect($('[id="A_1"]').attr("href")).toBe("#B_1");
    expect($('aside[id="B_1"]').length).toBe(1);
  });

  describe("footnote sheet", () => {
    it("writes the platform rules and links them from documents with notes", async () => {
      const store = await storeFrom(epub2Entries());
      await runLayout(store, "generic");

      const sheet = await text(store, "OEBPS/Styles/footnotes.css");
      expect(sheet.startsWith("/* Footnotes: generic */\n")).toBe(true);
      expect(sheet).toContain("a.footnote-ref span.footnote-icon {\n  display: inline-block;\n");
      expect(sheet).toContain("aside.footnote {\n  margin: 0.8em 0 0;\n");

      const opf = await loadPackageDocument(new DocumentCache(store));
      expect(opf.itemById("footnotes")).toMatchObject({
        href: "Styles/footnotes.css",
        mediaType: "text/css",
      });
      expect(await text(store, "OEBPS/Text/chapter-2.xhtml")).toContain(
        '<link href="../Styles/footnotes.css" rel="stylesheet" type="text/css"/>',
      );
      expect(await text(store, "OEBPS/Text/chapter-1.xhtml")).not.toContain("footnotes.css");
    });

    it("follows the platform classes and leaves out the icon rule for kindle", async () => {
      const duokan = await storeFrom(epub2Entries());
      await runLayout(duokan, "duokan");
      const duokanSheet = await text(duokan, "OEBPS/Styles/footnotes.css");
      expect(duokanSheet).toContain("a.duokan-footnote span.footnote-icon {");
      expect(duokanSheet).toContain("aside.duokan-footnote-content {");

      const kindle = await storeFrom(epub2Entries());
      await runLayout(kindle, "kindle");
      const kindleSheet = await text(kindle, "OEBPS/Styles/footnotes.css");
      expect(kindleSheet.startsWith("/* Footnotes: kindle */\n")).toBe(true);
      expect(kindleSheet).not.toContain("footnote-icon");
    });

    it("changes nothing on a second run", async () => {
      const store = await storeFrom(epub2Entries());
      await runLayout(store, "generic");
      const first = await snapshot(store);
      await runLayout(store, "generic");
      expect(await snapshot(store)).toEqual(first);
    });

    it("writes no sheet when no document has notes", async () => {
      const entries = epub2Entries();
      const store = await storeFrom({ ...entries, "OEBPS/Text/chapter-2.xhtml": CHAPTER_3 });
      await runLayout(store, "generic");
      expect(await store.exists("OEBPS/Styles/footnotes.css")).toBe(false);
    });
  });

  describe("font sheet", () => {
    const entries = {
      mimetype: "application/epub+zip",
      "META-INF/container.xml": CONTAINER_XML,
      "OEBPS/content.opf": `<?xml version="1.0" encoding="utf-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="uid">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:identifier id="uid">urn:uuid:00000000-0000-4000-8000-000000000004</dc:identifier>
    <dc:title>Fonts</dc:title>
  </metadata>
  <manifest>
    <item id="chapter-1" href="chapter-1.xhtml" media-type="application/xhtml+xml"/>
    <item id="main" href="Styles/main.css" media-type="text/css"/>
    <item id="font" href="Fonts/MyFont.ttf" media-type="font/ttf"/>
  </manifest>
  <spine>
    <itemref idref="chapter-1"/>
  </spine>
</package>
`,
      "OEBPS/chapter-1.xhtml": CHAPTER_3,
      "OEBPS/Styles/main.css": 'body { font-family: "st", serif; }\n.x { font-family: MyFont; }\n',
      "OEBPS/Fonts/MyFont.ttf": Buffer.from([0x00, 0x01, 0x00, 0x00]),
    };

    it("writes faces for embedded and fallback fonts and links the sheet", async () => {
      const store = await storeFrom(entries);
      await runLayout(store, "duokan");

      const sheet = await text(store, "OEBPS/Styles/font-faces.css");
      expect(sheet.startsWith('@font-face {\n  font-family: "st";\n  src: local("st"),\n    local("宋体"),')).toBe(
        true,
      );
      expect(sheet.endsWith(
        '@font-face {\n  font-family: "MyFont";\n  src: url("../Fonts/MyFont.ttf"),\n    local("MyFont");\n}\n',
      )).toBe(true);

      const opf = await loadPackageDocument(new DocumentCache(store));
      expect(opf.itemById("font-faces")).toMatchObject({
        href: "Styles/font-faces.css",
        mediaType: "text/css",
      });
      expect(await text(store, "OEBPS/content.opf")).toContain(
        '<meta name="duokan-body-font" content="DK-SONGTI"/>',
      );

      const chapter = await text(store, "OEBPS/chapter-1.xhtml");
      expect(chapter).toContain('<link href="Styles/font-faces.css" rel="stylesheet" type="text/css"/>');
      expect(chapter).toContain('<p><span class="koboSpan" id="kobo.1.1">Only paragraph.</span></p>');
    });

    it("changes nothing on a second run", async () => {
      const store = await storeFrom(entries);
      await runLayout(store, "duokan");
      const first = await snapshot(store);
      await runLayout(store, "duokan");
      expect(await snapshot(store)).toEqual(first);
    });
  });
});
