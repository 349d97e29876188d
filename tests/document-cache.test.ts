import { describe, it, expect } from "vitest";
import { DocumentCache } from "../app/lib/document/cache";
import { escapeXml, unescapeXml } from "../app/lib/document/xml-text";
import { ArchiveStore } from "../app/lib/package/archive-store";
import { CHAPTER_1, NCX, OPF_2, storeFrom, text } from "./helpers/fixtures";

const CHAPTER = "OEBPS/Text/chapter-1.xhtml";

async function setup(enabled = true) {
  const store = await storeFrom({ [CHAPTER]: CHAPTER_1, "OEBPS/toc.ncx": NCX, "OEBPS/content.opf": OPF_2 });
  return { store, cache: new DocumentCache(store, { enabled }) };
}

describe("DocumentCache", () => {
  it("parses once and serves the same tree afterwards", async () => {
    const { cache } = await setup();
    const [a, b] = await Promise.all([cache.readXml(CHAPTER), cache.readXml(CHAPTER)]);
    const c = await cache.readXml(CHAPTER);

    expect(a).toBe(b);
    expect(a).toBe(c);
    expect(cache.isCached(CHAPTER)).toBe(true);
  });

  it("parses on every read when caching is disabled", async () => {
    const { cache } = await setup(false);
    const a = await cache.readXml(CHAPTER);
    const b = await cache.readXml(CHAPTER);

    expect(a).not.toBe(b);
    expect(cache.isCached(CHAPTER)).toBe(false);
  });

  it("holds the written tree after a write", async () => {
    const { store, cache } = await setup();
    const doc = await cache.readXml(CHAPTER);
    doc.$("h1").text("Renamed");
    await cache.writeXml(CHAPTER, doc, "markup");

    expect(await text(store, CHAPTER)).toContain("<h1>Renamed</h1>");
    expect(await cache.readXml(CHAPTER)).toBe(doc);
  });

  it("drops a cached tree when the entry is overwritten behind its back", async () => {
    const { store, cache } = await setup();
    await cache.readXml(CHAPTER);
    await store.put(CHAPTER, '<html xmlns="http://www.w3.org/1999/xhtml"><body><h1>Other</h1></body></html>');

    expect(cache.isCached(CHAPTER)).toBe(false);
    const { $ } = await cache.readXml(CHAPTER);
    expect($("h1").text()).toBe("Other");
  });

  it("does not cache malformed documents", async () => {
    const store = ArchiveStore.empty();
    await store.put("bad.xhtml", "<html><body><p>unclosed</body></html>");
    await store.put("good.xhtml", "<html><body><p>fine</p></body></html>");
    const cache = new DocumentCache(store);

    await expect(cache.readXml("bad.xhtml")).rejects.toMatchObject({
      kind: "MalformedMarkup",
      path: "bad.xhtml",
    });
    expect(cache.isCached("bad.xhtml")).toBe(false);
    expect((await cache.readXml("good.xhtml")).$("p").text()).toBe("fine");

    await store.put("bad.xhtml", "<html><body><p>fixed</p></body></html>");
    expect((await cache.readXml("bad.xhtml")).$("p").text()).toBe("fixed");
  });

  it("rejects empty documents", async () => {
    const store = ArchiveStore.empty();
    await store.put("empty.xhtml", "  \n");
    await expect(new DocumentCache(store).readXml("empty.xhtml")).rejects.toMatchObject({
      kind: "MalformedMarkup",
    });
  });

  it("keeps named entities verbatim", async () => {
    const store = ArchiveStore.empty();
    await store.put("a.xhtml", "<html><body><p>a&nbsp;b &amp; c</p></body></html>");
    const cache = new DocumentCache(store);
    await cache.writeXml("a.xhtml", await cache.readXml("a.xhtml"), "markup");

    expect(await text(store, "a.xhtml")).toContain("<p>a&nbsp;b &amp; c</p>");
  });

  it("serializes markup with the doctype and XHTML namespace", async () => {
    const store = ArchiveStore.empty();
    await store.put("a.xhtml", '<html><body><a epub:type="noteref" href="#n">1</a></body></html>');
    const cache = new DocumentCache(store);
    await cache.writeXml("a.xhtml", await cache.readXml("a.xhtml"), "markup");

    expect(await text(store, "a.xhtml")).toBe(
      '<?xml version="1.0" encoding="utf-8"?>\n<!DOCTYPE html>\n' +
        '<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops">' +
        '<body><a epub:type="noteref" href="#n">1</a></body></html>\n',
    );
  });

  it("adds the package namespace in package mode", async () => {
    const store = ArchiveStore.empty();
    await store.put("content.opf", '<package version="3.0"><metadata/></package>');
    const cache = new DocumentCache(store);
    await cache.writeXml("content.opf", await cache.readXml("content.opf"), "package");

    expect(await text(store, "content.opf")).toBe(
      '<?xml version="1.0" encoding="utf-8"?>\n' +
        '<package version="3.0" xmlns="http://www.idpf.org/2007/opf"><metadata/></package>\n',
    );
  });

  it("fails with SerializationMismatch for the wrong root or namespace", async () => {
    const { cache } = await setup();
    const ncx = await cache.readXml("OEBPS/toc.ncx");
    await expect(cache.writeXml("OEBPS/toc.ncx", ncx, "package")).rejects.toMatchObject({
      kind: "SerializationMismatch",
    });

    const store = ArchiveStore.empty();
    await store.put("a.xhtml", '<html xmlns="urn:example:other"><body/></html>');
    const other = new DocumentCache(store);
    await expect(other.writeXml("a.xhtml", await other.readXml("a.xhtml"), "markup")).rejects.toMatchObject({
      kind: "SerializationMismatch",
    });
  });

  it("writes any root in xml mode", async () => {
    const { store, cache } = await setup();
    await cache.writeXml("OEBPS/toc.ncx", await cache.readXml("OEBPS/toc.ncx"), "xml");
    const written = await text(store, "OEBPS/toc.ncx");

    expect(written.startsWith('<?xml version="1.0" encoding="utf-8"?>\n<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/"')).toBe(true);
  });

  it("forgets trees on invalidate and clear", async () => {
    const { cache } = await setup();
    await cache.readXml(CHAPTER);
    await cache.readXml("OEBPS/toc.ncx");

    cache.invalidate(CHAPTER);
    expect(cache.isCached(CHAPTER)).toBe(false);
    expect(cache.isCached("OEBPS/toc.ncx")).toBe(true);
    cache.clear();
    expect(cache.isCached("OEBPS/toc.ncx")).toBe(false);
  });
});

describe("xml text helpers", () => {
  it("escapes and unescapes the XML special characters", () => {
    expect(escapeXml(`a<b> & "c" 'd'`)).toBe("a&lt;b&gt; &amp; &quot;c&quot; &apos;d&apos;");
    expect(unescapeXml("&lt;p&gt; &amp;amp; &#65;&#x42; &nbsp;")).toBe("<p> &amp; AB &nbsp;");
  });
});
