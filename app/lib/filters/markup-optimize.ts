import type { CheerioAPI } from "cheerio";
import { serializeDocument } from "../document/serialize";
import { escapeXml } from "../document/xml-text";
import { loadPackageDocument } from "../epub/package-document";
import { basenameOf, extensionOf } from "../package/paths";
import { NO_OPTIONS, type PackageFilter } from "./types";

const MARKUP_DOCUMENT = new Set([".xhtml", ".html", ".htm"]);

function unwrapBareSpans($: CheerioAPI): void {
  // innermost first so nested bare spans collapse fully
  const spans = $("span")
    .toArray()
    .filter((el) => Object.keys(el.attribs).length === 0)
    .reverse();
  for (const el of spans) {
    const span = $(el);
    span.replaceWith(span.contents());
  }
}

function dropEmptyAttributes($: CheerioAPI): void {
  $("[class], [style]").each((_, el) => {
    for (const attr of ["class", "style"]) {
      const value = el.attribs[attr];
      if (value !== undefined && value.trim() === "") delete el.attribs[attr];
    }
  });
}

function ensureHead($: CheerioAPI, title: string): void {
  const html = $("html").first();
  if (html.length === 0) return;
  let head = html.children("head").first();
  if (head.length === 0) {
    html.prepend("\n<head>\n</head>");
    head = html.children("head").first();
  }

  const httpEquiv = head
    .children("meta")
    .filter((_, el) => (el.attribs["http-equiv"] ?? "").toLowerCase() === "content-type");
  if (httpEquiv.length > 0) {
    httpEquiv.first().replaceWith('<meta charset="utf-8"/>');
    httpEquiv.slice(1).remove();
  }

  const existing = head.children("title").first();
  if (existing.length === 0) {
    head.prepend(`\n  <title>${title}</title>`);
  } else if (existing.text().trim() === "") {
    existing.text(title);
  }
}

export const markupOptimize: PackageFilter = {
  name: "markup-optimize",
  description: "Rewrites content documents toward canonical XHTML",
  optionsSchema: NO_OPTIONS,
  async run({ store, cache }) {
    const opf = await loadPackageDocument(cache);
    const bookTitle = opf.title();

    for (const path of await store.list()) {
      if (!MARKUP_DOCUMENT.has(extensionOf(path))) continue;
      const doc = await cache.readXml(path);
      const { $ } = doc;

      unwrapBareSpans($);
      dropEmptyAttributes($);
      ensureHead($, escapeXml(bookTitle ?? basenameOf(path)));

      // namespace declarations and the doctype come from the serializer
      const original = (await store.get(path)).toString("utf8");
      if (serializeDocument($, "markup", path) !== original) {
        await cache.writeXml(path, doc, "markup");
      }
    }
  },
};
