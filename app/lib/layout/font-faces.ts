import type { CheerioAPI } from "cheerio";
import {
  allDeclarations,
  fontFamilies,
  parseDeclarations,
  parseStylesheet,
  type CssBlock,
} from "../document/css";
import type { DocumentCache } from "../document/cache";
import { escapeXml } from "../document/xml-text";
import type { PackageDocument } from "../epub/package-document";
import {
  basenameOf,
  extensionOf,
  isFontPath,
  joinEntryPath,
  relativeHref,
  resolveHref,
} from "../package/paths";
import type { PackageStore } from "../package/store";
import fontFallbacks from "./font-fallbacks.json";

export const FONT_SHEET_NAME = "Styles/font-faces.css";

const LOCAL_FALLBACKS: Record<string, string[]> = fontFallbacks;

const GENERIC_FAMILIES = new Set([
  "serif",
  "sans-serif",
  "monospace",
  "cursive",
  "fantasy",
  "system-ui",
  "inherit",
  "initial",
  "unset",
]);

const MARKUP_DOCUMENT = new Set([".xhtml", ".html", ".htm"]);

export interface FontFace {
  family: string;
  /** Embedded font entry, when one matches */
  file: string | null;
  locals: string[];
}

function stem(path: string): string {
  const name = basenameOf(path);
  const dot = name.lastIndexOf(".");
  return (dot > 0 ? name.slice(0, dot) : name).toLowerCase();
}

/** family -> font entry declared by existing @font-face rules */
function declaredFaces(blocks: CssBlock[], sheetPath: string, faces: Map<string, string>): void {
  for (const block of blocks) {
    if (block.type === "group") declaredFaces(block.children, sheetPath, faces);
    if (block.type !== "at-rule" || !/^@font-face$/i.test(block.prelude)) continue;
    const family = block.declarations.find((d) => d.property === "font-family");
    const src = block.declarations.find((d) => d.property === "src");
    const url = src?.value.match(/url\(\s*(["']?)([^"')]+)\1\s*\)/i)?.[2];
    const name = family ? fontFamilies(family.value)[0] : undefined;
    const target = url ? resolveHref(url, sheetPath) : null;
    if (name && target && !faces.has(name.toLowerCase())) faces.set(name.toLowerCase(), target);
  }
}

/**
 * Font families referenced by style sheets and style attributes, matched to
 * embedded fonts by existing @font-face src or by file name.
 */
export async function collectFontFaces(
  store: PackageStore,
  cache: DocumentCache,
  sheetPath: string,
): Promise<FontFace[]> {
  const referenced: string[] = [];
  const declared = new Map<string, string>();
  const fonts: string[] = [];

  const addFamilies = (value: string) => {
    for (const family of fontFamilies(value)) {
      const key = family.toLowerCase();
      if (GENERIC_FAMILIES.has(key) || referenced.some((f) => f.toLowerCase() === key)) continue;
      referenced.push(family);
    }
  };

  for (const path of await store.list()) {
    if (isFontPath(path)) {
      fonts.push(path);
    } else if (extensionOf(path) === ".css" && path !== sheetPath) {
      const blocks = parseStylesheet((await store.get(path)).toString("utf8"));
      declaredFaces(blocks, path, declared);
      allDeclarations(blocks)
        .filter((d) => d.property === "font-family")
        .forEach((d) => addFamilies(d.value));
    } else if (MARKUP_DOCUMENT.has(extensionOf(path))) {
      const { $ } = await cache.readXml(path);
      $("[style]").each((_, el) => {
        parseDeclarations(el.attribs.style ?? "")
          .filter((d) => d.property === "font-family")
          .forEach((d) => addFamilies(d.value));
      });
    }
  }

  const faces: FontFace[] = [];
  for (const family of referenced) {
    const key = family.toLowerCase();
    const declaredFile = declared.get(key);
    const file =
      (declaredFile && fonts.includes(declaredFile) ? declaredFile : undefined) ??
      fonts.find((font) => stem(font) === key) ??
      null;
    const locals = LOCAL_FALLBACKS[family] ?? LOCAL_FALLBACKS[key];
    if (!file && !locals) continue;
    faces.push({ family, file, locals: locals ?? [family] });
  }
  return faces;
}

function cssString(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export function renderFontSheet(faces: FontFace[], sheetPath: string): string {
  return faces
    .map((face) => {
      const sources = [
        ...(face.file ? [`url(${cssString(relativeHref(sheetPath, face.file))})`] : []),
        ...face.locals.map((name) => `local(${cssString(name)})`),
      ];
      return `@font-face {\n  font-family: ${cssString(face.family)};\n  src: ${sources.join(",\n    ")};\n}\n`;
    })
    .join("");
}

/**
 * Write the generated font sheet next to the package document and list it in
 * the manifest. Returns the sheet path, or null when no family needs a face.
 */
export async function writeFontSheet(
  store: PackageStore,
  cache: DocumentCache,
  opf: PackageDocument,
): Promise<string | null> {
  const sheetPath = joinEntryPath(opf.opfDir, FONT_SHEET_NAME);
  const faces = await collectFontFaces(store, cache, sheetPath);
  if (faces.length === 0) return null;

  await store.put(sheetPath, renderFontSheet(faces, sheetPath));
  if (!opf.itemByPath(sheetPath)) {
    opf.addItem(sheetPath, "text/css", { id: "font-faces" });
  }
  console.log(`[Layout] Wrote ${faces.length} font faces to ${sheetPath}`);
  return sheetPath;
}

/** Link a style sheet from a document's head unless already linked */
export function linkStylesheet($: CheerioAPI, documentPath: string, sheetPath: string): boolean {
  const href = relativeHref(documentPath, sheetPath);
  const head = $("head").first();
  if (head.length === 0) return false;
  const linked = head
    .children("link")
    .toArray()
    .some((el) => resolveHref(el.attribs.href ?? "", documentPath) === sheetPath);
  if (linked) return false;
  head.append(`<link href="${escapeXml(href)}" rel="stylesheet" type="text/css"/>\n`);
  return true;
}
