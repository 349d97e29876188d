import JSZip from "jszip";
import { mkdtemp } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { ArchiveStore } from "../../app/lib/package/archive-store";
import type { PackageStore } from "../../app/lib/package/store";

export type Entries = Record<string, string | Buffer>;

export const CONTAINER_XML = `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>
`;

export const OPF_2 = `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="2.0" unique-identifier="BookId">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:opf="http://www.idpf.org/2007/opf">
    <dc:title>Test Book</dc:title>
    <dc:creator opf:role="aut" opf:file-as="Author, Test">Test Author</dc:creator>
    <dc:identifier id="BookId" opf:scheme="UUID">urn:uuid:00000000-0000-4000-8000-000000000001</dc:identifier>
    <dc:language>en</dc:language>
    <meta name="cover" content="cover-image"/>
  </metadata>
  <manifest>
    <item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>
    <item id="chapter-1" href="Text/chapter-1.xhtml" media-type="application/xhtml+xml"/>
    <item id="chapter-2" href="Text/chapter-2.xhtml" media-type="application/xhtml+xml"/>
    <item id="style" href="Styles/style.css" media-type="text/css"/>
    <item id="cover-image" href="Images/cover.jpg" media-type="image/jpeg"/>
  </manifest>
  <spine toc="ncx">
    <itemref idref="chapter-1"/>
    <itemref idref="chapter-2"/>
  </spine>
  <guide>
    <reference type="text" title="Start" href="Text/chapter-1.xhtml"/>
  </guide>
</package>
`;

export const NCX = `<?xml version="1.0" encoding="UTF-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
  <head>
    <meta name="dtb:uid" content="urn:uuid:00000000-0000-4000-8000-000000000001"/>
  </head>
  <docTitle><text>Test Book</text></docTitle>
  <navMap>
    <navPoint id="np-1" playOrder="1">
      <navLabel><text>Chapter One</text></navLabel>
      <content src="Text/chapter-1.xhtml"/>
    </navPoint>
    <navPoint id="np-2" playOrder="2">
      <navLabel><text>Chapter Two</text></navLabel>
      <content src="Text/chapter-2.xhtml#start"/>
    </navPoint>
  </navMap>
</ncx>
`;

export const CHAPTER_1 = `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE html PUBLIC "-//W3C//DTD XHTML 1.1//EN" "http://www.w3.org/TR/xhtml11/DTD/xhtml11.dtd">
<html xmlns="http://www.w3.org/1999/xhtml">
<head>
  <title>Chapter One</title>
  <link href="../Styles/style.css" rel="stylesheet" type="text/css"/>
</head>
<body>
  <h1>Chapter One</h1>
  <p class="first">It was a dark night. The rain fell!</p>
  <p>Second paragraph.</p>
</body>
</html>
`;

export const CHAPTER_2 = `<?xml version="1.0" encoding="UTF-8"?>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops">
<head>
  <title>Chapter Two</title>
</head>
<body>
  <h1 id="start">Chapter Two</h1>
  <p>See the note<a epub:type="noteref" href="#note-1" id="ref-1">1</a>. Then more.</p>
  <div class="notes">
    <p id="note-1"><a href="#ref-1">1</a> The note text.</p>
  </div>
</body>
</html>
`;

export const STYLE_CSS = `/* base */
body { margin: 0; }
p.first { text-indent: 0; COLOR: #FFAA00 }
.unused { color: red; }
#missing, h1 { font-weight: bold; }
.empty { }
@media print {
  .unused { display: none; }
}
`;

/** JPEG start-of-image marker followed by filler */
export const COVER_JPG = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46]);

export function epub2Entries(): Entries {
  return {
    mimetype: "application/epub+zip",
    "META-INF/container.xml": CONTAINER_XML,
    "OEBPS/content.opf": OPF_2,
    "OEBPS/toc.ncx": NCX,
    "OEBPS/Text/chapter-1.xhtml": CHAPTER_1,
    "OEBPS/Text/chapter-2.xhtml": CHAPTER_2,
    "OEBPS/Styles/style.css": STYLE_CSS,
    "OEBPS/Images/cover.jpg": COVER_JPG,
  };
}

export const OPF_3 = `<?xml version="1.0" encoding="utf-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="uid">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:identifier id="uid">urn:uuid:00000000-0000-4000-8000-000000000003</dc:identifier>
    <dc:title>Third Book</dc:title>
    <dc:language>en</dc:language>
    <meta property="dcterms:modified">2024-01-01T00:00:00Z</meta>
  </metadata>
  <manifest>
    <item id="nav" href="nav.xhtml" media-type="application/xhtml+xml" properties="nav"/>
    <item id="chapter-1" href="chapter-1.xhtml" media-type="application/xhtml+xml"/>
  </manifest>
  <spine>
    <itemref idref="nav"/>
    <itemref idref="chapter-1"/>
  </spine>
</package>
`;

export const NAV_3 = `<?xml version="1.0" encoding="utf-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops">
<head>
  <title>Third Book</title>
</head>
<body>
  <nav epub:type="toc" id="toc">
    <ol>
      <li><a href="chapter-1.xhtml">One</a></li>
    </ol>
  </nav>
</body>
</html>
`;

export const CHAPTER_3 = `<?xml version="1.0" encoding="utf-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml">
<head>
  <title>One</title>
</head>
<body>
  <p>Only paragraph.</p>
</body>
</html>
`;

export function epub3Entries(): Entries {
  return {
    mimetype: "application/epub+zip",
    "META-INF/container.xml": CONTAINER_XML,
    "OEBPS/content.opf": OPF_3,
    "OEBPS/nav.xhtml": NAV_3,
    "OEBPS/chapter-1.xhtml": CHAPTER_3,
  };
}

export async function storeFrom(entries: Entries): Promise<ArchiveStore> {
  const store = ArchiveStore.empty();
  for (const [path, content] of Object.entries(entries)) {
    await store.put(path, content);
  }
  return store;
}

/** Zip blob built directly with jszip, mimetype first and stored */
export async function zipFrom(entries: Entries): Promise<Buffer> {
  const zip = new JSZip();
  for (const [path, content] of Object.entries(entries)) {
    zip.file(path, content, path === "mimetype" ? { compression: "STORE" } : {});
  }
  return zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
}

/** Path -> content (utf8 for text, hex for binary) in list order */
export async function snapshot(store: PackageStore): Promise<Record<string, string>> {
  const result: Record<string, string> = {};
  for (const path of await store.list()) {
    const entry = await store.entry(path);
    result[path] = entry.kind === "binary" ? entry.bytes.toString("hex") : entry.bytes.toString("utf8");
  }
  return result;
}

export async function text(store: PackageStore, path: string): Promise<string> {
  return (await store.get(path)).toString("utf8");
}

export function makeTempDir(prefix = "quire-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}
