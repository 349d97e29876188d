import { v4 as uuid } from "uuid";
import { DC_NS } from "../document/serialize";
import { escapeXml } from "../document/xml-text";
import {
  appendIndented,
  loadPackageDocument,
  localNameOf,
  removeIndented,
} from "../epub/package-document";
import { NO_OPTIONS, type PackageFilter } from "./types";

/** `EN_us` -> `en-US`, `zh-hant-tw` -> `zh-Hant-TW` */
export function canonicalLanguageTag(tag: string): string {
  const parts = tag.trim().replace(/_/g, "-").split("-").filter(Boolean);
  return parts
    .map((part, index) => {
      if (index === 0) return part.toLowerCase();
      if (part.length === 2) return part.toUpperCase();
      if (part.length === 4) return part[0].toUpperCase() + part.slice(1).toLowerCase();
      return part.toLowerCase();
    })
    .join("-");
}

const pad2 = (value: string) => value.padStart(2, "0");

/**
 * Dates as ISO 8601 (`YYYY`, `YYYY-MM` or `YYYY-MM-DD`); values that cannot
 * be read as a date are returned unchanged.
 */
export function canonicalDate(value: string): string {
  const trimmed = value.trim();
  if (/^\d{4}(-\d{2}(-\d{2})?)?$/.test(trimmed)) return trimmed;
  if (/^\d{4}-\d{2}-\d{2}T[\d:.]+(Z|[+-]\d{2}:?\d{2})?$/.test(trimmed)) return trimmed;

  const numeric = trimmed.match(/^(\d{4})[-/.](\d{1,2})(?:[-/.](\d{1,2}))?$/);
  if (numeric) {
    const [, year, month, day] = numeric;
    return day ? `${year}-${pad2(month)}-${pad2(day)}` : `${year}-${pad2(month)}`;
  }

  const parsed = Date.parse(trimmed);
  if (Number.isNaN(parsed)) return trimmed;
  const date = new Date(parsed);
  return `${date.getFullYear()}-${pad2(String(date.getMonth() + 1))}-${pad2(String(date.getDate()))}`;
}

export const metadataNormalize: PackageFilter = {
  name: "metadata-normalize",
  description: "Canonicalizes descriptive metadata",
  optionsSchema: NO_OPTIONS,
  async run({ cache, config }) {
    const opf = await loadPackageDocument(cache);
    const { $ } = opf;
    const before = $.xml();
    const metadata = opf.ensureSection("metadata");

    const seen = new Set<string>();
    metadata.children().each((_, el) => {
      if (!el.name.startsWith("dc:")) return;
      const node = $(el);
      if (node.children().length > 0) return;

      const local = localNameOf(el.name);
      let text = node.text().replace(/\s+/g, " ").trim();
      if (local === "language") text = canonicalLanguageTag(text);
      if (local === "date") text = canonicalDate(text);

      const key = `${local}\u0000${text}`;
      if (!text || seen.has(key)) {
        removeIndented($, node);
        return;
      }
      seen.add(key);
      if (node.text() !== text) node.text(text);
    });

    const dcPrefixed = (name: string) =>
      metadata.children().filter((_, el) => el.name === `dc:${name}`);
    const needsDcNamespace =
      metadata.attr("xmlns:dc") === undefined && opf.root.attr("xmlns:dc") === undefined;

    if (dcPrefixed("title").length === 0) {
      appendIndented($, metadata, "<dc:title>Untitled</dc:title>");
    }
    if (dcPrefixed("language").length === 0) {
      const language = escapeXml(canonicalLanguageTag(config.metadata.defaultLanguage));
      appendIndented($, metadata, `<dc:language>${language}</dc:language>`);
    }

    const uidRef = opf.root.attr("unique-identifier");
    const identifiers = dcPrefixed("identifier");
    if (!uidRef || identifiers.filter((_, el) => el.attribs.id === uidRef).length === 0) {
      const named = identifiers.filter((_, el) => Boolean(el.attribs.id)).first().attr("id");
      const unnamed = identifiers.first();
      let id: string;
      if (named) {
        id = named;
      } else if (unnamed.length > 0) {
        id = opf.uniqueId("BookId");
        unnamed.attr("id", id);
      } else {
        id = opf.uniqueId("BookId");
        appendIndented($, metadata, `<dc:identifier id="${id}">urn:uuid:${uuid()}</dc:identifier>`);
      }
      opf.root.attr("unique-identifier", id);
    }

    if (needsDcNamespace) metadata.attr("xmlns:dc", DC_NS);

    if ($.xml() !== before) await opf.save(cache);
  },
};
