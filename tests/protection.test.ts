import { describe, it, expect } from "vitest";
import { entryChecksum, scramble } from "../app/lib/protection/algorithms";
import { protect, unprotect } from "../app/lib/protection/codec";
import { ENCRYPTION_PATH, readManifest } from "../app/lib/protection/manifest";
import { confusableName, obfuscatedPath } from "../app/lib/protection/naming";
import { COVER_JPG, epub2Entries, snapshot, storeFrom, text } from "./helpers/fixtures";

const BOOK_ID = "urn:uuid:00000000-0000-4000-8000-000000000001";

function fontAndImage() {
  return storeFrom({
    "fonts/a.ttf": Buffer.alloc(16, 0xff),
    "images/b.png": Buffer.alloc(0),
  });
}

describe("naming", () => {
  it("writes 64 confusable characters", () => {
    const name = confusableName("fonts/a.ttf", "salt");
    expect(name).toMatch(/^[Il]{64}$/);
    expect(confusableName("fonts/a.ttf", "salt")).toBe(name);
    expect(confusableName("fonts/a.ttf", "other")).not.toBe(name);
  });

  it("keeps the directory and extension", () => {
    expect(obfuscatedPath("OEBPS/Fonts/A.TTF", "salt")).toMatch(/^OEBPS\/Fonts\/[Il]{64}\.ttf$/);
    expect(obfuscatedPath("cover.jpg", "salt")).toMatch(/^[Il]{64}\.jpg$/);
  });
});

describe("scramble", () => {
  const params = { key: "pw", salt: "salt", path: "fonts/a.ttf" };
  const bytes = Buffer.from(Array.from({ length: 2000 }, (_, i) => i % 251));

  it("is its own inverse for every algorithm", () => {
    for (const algorithm of ["basic", "idpf", "adobe"] as const) {
      const scrambled = scramble(algorithm, bytes, params);
      expect(scrambled.equals(bytes)).toBe(false);
      expect(scramble(algorithm, scrambled, params).equals(bytes)).toBe(true);
    }
  });

  it("touches only the header for idpf and adobe", () => {
    expect(scramble("idpf", bytes, params).subarray(1040).equals(bytes.subarray(1040))).toBe(true);
    expect(scramble("adobe", bytes, params).subarray(1024).equals(bytes.subarray(1024))).toBe(true);
  });

  it("derives the checksum from key, salt and content", () => {
    expect(entryChecksum("pw", "salt", bytes)).toMatch(/^[0-9a-f]{32}$/);
    expect(entryChecksum("pw", "salt", bytes)).not.toBe(entryChecksum("px", "salt", bytes));
  });
});

describe("protect / unprotect", () => {
  it("round-trips a font and an empty image", async () => {
    const store = await fontAndImage();

    const mappings = await protect(store, { key: "pw", algorithm: "basic" });
    expect(mappings.map((m) => m.originalPath)).toEqual(["fonts/a.ttf", "images/b.png"]);
    expect(mappings[0].protectedPath).toMatch(/^fonts\/[Il]{64}\.ttf$/);
    expect(mappings[1].protectedPath).toMatch(/^images\/[Il]{64}\.png$/);
    expect(await store.exists("fonts/a.ttf")).toBe(false);
    expect((await store.get(mappings[0].protectedPath)).equals(Buffer.alloc(16, 0xff))).toBe(false);

    const manifest = await readManifest(store);
    expect(manifest.entries).toHaveLength(2);
    expect(manifest.entries[0]).toMatchObject({
      algorithm: "basic",
      originalPath: "fonts/a.ttf",
      protectedPath: mappings[0].protectedPath,
    });

    const restored = await unprotect(store, { key: "pw" });
    expect(restored).toEqual(mappings);
    expect((await store.get("fonts/a.ttf")).equals(Buffer.alloc(16, 0xff))).toBe(true);
    expect((await store.get("images/b.png")).length).toBe(0);
    expect(await store.list()).toEqual(["fonts/a.ttf", "images/b.png"]);
  });

  it("fails with AuthenticationFailure for a wrong key and changes nothing", async () => {
    const store = await fontAndImage();
    await protect(store, { key: "pw" });
    const before = await snapshot(store);

    await expect(unprotect(store, { key: "wrong" })).rejects.toMatchObject({ kind: "AuthenticationFailure" });
    expect(await snapshot(store)).toEqual(before);
  });

  it("requires a key", async () => {
    const store = await fontAndImage();
    await expect(protect(store, { key: "" })).rejects.toMatchObject({ kind: "InvalidConfiguration" });
  });

  it("skips entries that are already protected", async () => {
    const store = await fontAndImage();
    await protect(store, { key: "pw" });
    expect(await protect(store, { key: "pw" })).toEqual([]);
    expect((await readManifest(store)).entries).toHaveLength(2);
  });

  it("fails with ManifestInconsistent when a protected entry is gone", async () => {
    const store = await fontAndImage();
    const [first] = await protect(store, { key: "pw" });
    await store.delete(first.protectedPath);

    await expect(unprotect(store, { key: "pw" })).rejects.toMatchObject({
      kind: "ManifestInconsistent",
      path: first.protectedPath,
    });
    expect(await store.exists("images/b.png")).toBe(false);
  });

  it("salts with the package identifier and follows renames in references", async () => {
    const entries = {
      ...epub2Entries(),
      "OEBPS/Styles/fonts.css": '@font-face { font-family: "Serif"; src: url("../Fonts/serif.ttf"); }\n',
      "OEBPS/Fonts/serif.ttf": Buffer.from("font-bytes"),
    };
    const store = await storeFrom(entries);
    const original = await snapshot(store);

    const mappings = await protect(store, { key: "test-secret", algorithm: "idpf" });
    expect(mappings.map((m) => m.originalPath).sort()).toEqual(["OEBPS/Fonts/serif.ttf", "OEBPS/Images/cover.jpg"]);

    const manifest = await readManifest(store);
    expect(manifest.entries.every((entry) => entry.salt === BOOK_ID)).toBe(true);
    const cover = mappings.find((m) => m.originalPath === "OEBPS/Images/cover.jpg");
    const font = mappings.find((m) => m.originalPath === "OEBPS/Fonts/serif.ttf");
    expect(cover?.protectedPath).toBe(obfuscatedPath("OEBPS/Images/cover.jpg", BOOK_ID));

    const opf = await text(store, "OEBPS/content.opf");
    expect(opf).not.toContain("Images/cover.jpg");
    expect(opf).toContain(`href="${cover?.protectedPath.replace("OEBPS/", "")}"`);
    expect(await text(store, "OEBPS/Styles/fonts.css")).toContain(
      `url("../Fonts/${font?.protectedPath.split("/").pop()}")`,
    );

    const xml = await text(store, ENCRYPTION_PATH);
    expect(xml).toContain('<enc:EncryptionMethod Algorithm="http://www.idpf.org/2008/embedding"/>');
    expect(xml).toContain("<quire:original-path>OEBPS/Images/cover.jpg</quire:original-path>");

    await unprotect(store, { key: "test-secret" });
    expect(await snapshot(store)).toEqual(original);
  });

  it("preserves encryption records written by other tools", async () => {
    const foreign = `<?xml version="1.0" encoding="UTF-8"?>
<encryption xmlns="urn:oasis:names:tc:opendocument:xmlns:container" xmlns:enc="http://www.w3.org/2001/04/xmlenc#">
  <enc:EncryptedData>
    <enc:EncryptionMethod Algorithm="http://www.idpf.org/2008/embedding"/>
    <enc:CipherData>
      <enc:CipherReference URI="OEBPS/Fonts/pub.otf"/>
    </enc:CipherData>
  </enc:EncryptedData>
</encryption>
`;
    const store = await storeFrom({
      [ENCRYPTION_PATH]: foreign,
      "OEBPS/Fonts/pub.otf": Buffer.from("publisher-font"),
      "OEBPS/Fonts/mine.ttf": Buffer.from("my-font"),
    });

    const mappings = await protect(store, { key: "pw" });
    expect(mappings.map((m) => m.originalPath)).toEqual(["OEBPS/Fonts/mine.ttf"]);
    expect(await store.exists("OEBPS/Fonts/pub.otf")).toBe(true);
    expect(await text(store, ENCRYPTION_PATH)).toContain('<enc:CipherReference URI="OEBPS/Fonts/pub.otf"/>');

    await unprotect(store, { key: "pw" });
    const manifest = await readManifest(store);
    expect(manifest.entries).toEqual([]);
    expect(manifest.foreignPaths).toEqual(["OEBPS/Fonts/pub.otf"]);
    expect(await text(store, "OEBPS/Fonts/mine.ttf")).toBe("my-font");
  });

  it("leaves protected style sheets out of reference rewriting", async () => {
    const css = `${".p { margin: 0; }\n".repeat(70)}@font-face { font-family: "F"; src: url("../Fonts/f.ttf"); }\n`;
    const store = await storeFrom({
      "OEBPS/Styles/book.css": css,
      "OEBPS/Fonts/f.ttf": Buffer.from("font-bytes"),
    });
    const original = await snapshot(store);

    const mappings = await protect(store, { key: "pw", algorithm: "idpf", include: [".css", ".ttf"] });
    expect(mappings).toHaveLength(2);
    const sheet = mappings.find((m) => m.originalPath === "OEBPS/Styles/book.css");
    const scrambled = await store.get(sheet?.protectedPath ?? "");
    expect(scrambled.subarray(1040).toString("utf8")).toContain('url("../Fonts/f.ttf")');

    await unprotect(store, { key: "pw" });
    expect(await snapshot(store)).toEqual(original);
  });

  it("restores percent-encoded references as written", async () => {
    const entries = epub2Entries();
    const store = await storeFrom({
      ...Object.fromEntries(Object.entries(entries).filter(([path]) => path !== "OEBPS/Images/cover.jpg")),
      "OEBPS/content.opf": String(entries["OEBPS/content.opf"]).replace(
        'href="Images/cover.jpg"',
        'href="Images/my%20cover.jpg"',
      ),
      "OEBPS/Images/my cover.jpg": COVER_JPG,
    });
    const original = await snapshot(store);

    await protect(store, { key: "pw" });
    expect(await text(store, "OEBPS/content.opf")).not.toContain("my%20cover.jpg");
    await unprotect(store, { key: "pw" });

    expect(await text(store, "OEBPS/content.opf")).toContain('href="Images/my%20cover.jpg"');
    expect(await snapshot(store)).toEqual(original);
  });
});
