import { lookup } from "mime-types";
import { PackageError } from "../errors";
import type { EntryKind } from "../types";

/**
 * Normalize an entry path to the canonical form used as a store key:
 * `/`-separated, no leading slash, no empty, `.` or `..` segments.
 */
export function normalizeEntryPath(path: string): string {
  const normalized = path.replace(/\\/g, "/");
  const segments = normalized.split("/");
  if (
    normalized.length === 0 ||
    normalized.startsWith("/") ||
    segments.some((s) => s === "" || s === "." || s === "..")
  ) {
    throw new PackageError("InvalidPath", `Invalid entry path: "${path}"`, { path });
  }
  return normalized;
}

export function isValidEntryPath(path: string): boolean {
  try {
    normalizeEntryPath(path);
    return true;
  } catch {
    return false;
  }
}

export function dirnameOf(path: string): string {
  const idx = path.lastIndexOf("/");
  return idx === -1 ? "" : path.slice(0, idx);
}

export function joinEntryPath(dir: string, name: string): string {
  return dir ? `${dir}/${name}` : name;
}

export function basenameOf(path: string): string {
  return path.slice(path.lastIndexOf("/") + 1);
}

export function extensionOf(path: string): string {
  const name = basenameOf(path);
  const idx = name.lastIndexOf(".");
  return idx <= 0 ? "" : name.slice(idx).toLowerCase();
}

/**
 * Split "a/b.xhtml#frag" into the path part and the fragment ("" when absent).
 */
export function splitFragment(href: string): { target: string; fragment: string } {
  const idx = href.indexOf("#");
  if (idx === -1) return { target: href, fragment: "" };
  return { target: href.slice(0, idx), fragment: href.slice(idx) };
}

export function isExternalHref(href: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(href) || href.startsWith("//");
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Resolve a reference written inside `referPath` to a full entry path.
 * Returns null for external URLs, bare fragments and references that climb
 * above the package root.
 */
export function resolveHref(href: string, referPath: string): string | null {
  const { target } = splitFragment(href.trim());
  const withoutQuery = target.split("?")[0];
  if (!withoutQuery || isExternalHref(withoutQuery)) return null;

  const decoded = safeDecode(withoutQuery);
  const parts = decoded.startsWith("/")
    ? []
    : dirnameOf(referPath).split("/").filter(Boolean);

  for (const segment of decoded.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      if (parts.length === 0) return null;
      parts.pop();
      continue;
    }
    parts.push(segment);
  }
  return parts.length > 0 ? parts.join("/") : null;
}

/**
 * Reference from the entry at `fromPath` to the entry at `toPath`.
 */
export function relativeHref(fromPath: string, toPath: string): string {
  const fromParts = dirnameOf(fromPath).split("/").filter(Boolean);
  const toParts = toPath.split("/");
  while (fromParts.length > 0 && toParts.length > 1 && fromParts[0] === toParts[0]) {
    fromParts.shift();
    toParts.shift();
  }
  return "../".repeat(fromParts.length) + toParts.join("/");
}

const MARKUP_EXTENSIONS = new Set([".xhtml", ".html", ".htm", ".opf", ".ncx", ".xml", ".svg"]);
const TEXT_EXTENSIONS = new Set([".css", ".txt", ".js", ".json", ".plist"]);

export function entryKindOf(path: string): EntryKind {
  const ext = extensionOf(path);
  if (MARKUP_EXTENSIONS.has(ext)) return "markup";
  if (TEXT_EXTENSIONS.has(ext) || path === "mimetype") return "text";
  return "binary";
}

// EPUB core media types that differ from the generic registry
const MEDIA_TYPE_OVERRIDES: Record<string, string> = {
  ".xhtml": "application/xhtml+xml",
  ".htm": "application/xhtml+xml",
  ".html": "application/xhtml+xml",
  ".ncx": "application/x-dtbncx+xml",
  ".opf": "application/oebps-package+xml",
  ".js": "application/javascript",
};

export function mediaTypeOf(path: string): string | null {
  const ext = extensionOf(path);
  if (MEDIA_TYPE_OVERRIDES[ext]) return MEDIA_TYPE_OVERRIDES[ext];
  return lookup(path) || null;
}

const FONT_TYPE = /font|opentype|sfnt/i;

/**
 * Whether a declared manifest media type is acceptable for an entry.
 * Font files go by many aliases (font/ttf, application/x-font-ttf,
 * application/vnd.ms-opentype, ...); any font type is accepted for a font.
 */
export function mediaTypeMatches(declared: string, path: string): boolean {
  const expected = mediaTypeOf(path);
  if (!expected) return true;
  const actual = declared.trim().toLowerCase();
  if (actual === expected) return true;
  return FONT_TYPE.test(expected) && FONT_TYPE.test(actual);
}

export function isFontPath(path: string): boolean {
  return [".ttf", ".otf", ".woff", ".woff2"].includes(extensionOf(path));
}

export function isImagePath(path: string): boolean {
  return [".jpg", ".jpeg", ".png", ".gif", ".svg", ".webp", ".bmp"].includes(extensionOf(path));
}
