import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import type { DocumentCache } from "../document/cache";
import { escapeXml, unescapeXml } from "../document/xml-text";
import { basenameOf, relativeHref, resolveHref, splitFragment } from "../package/paths";
import { byLocalName, localNameOf } from "./package-document";

export interface NavPoint {
  /** Label markup as written in the source (entities kept) */
  label: string;
  /** Full entry path of the target, null for label-only headings */
  target: string | null;
  fragment: string;
  children: NavPoint[];
}

export interface Landmark {
  type: string;
  label: string;
  target: string;
  fragment: string;
}

const GUIDE_LANDMARKS: Record<string, string> = {
  cover: "cover",
  "title-page": "titlepage",
  toc: "toc",
  text: "bodymatter",
  bodymatter: "bodymatter",
  preface: "preface",
  foreword: "foreword",
  acknowledgements: "acknowledgments",
  "copyright-page": "copyright-page",
  dedication: "dedication",
  colophon: "colophon",
  glossary: "glossary",
  index: "index",
  bibliography: "bibliography",
  notes: "endnotes",
  loi: "loi",
  lot: "lot",
};

export function landmarkTypeFor(guideType: string): string | null {
  return GUIDE_LANDMARKS[guideType.trim().toLowerCase()] ?? null;
}

function childrenNamed(parent: Cheerio<Element>, name: string): Cheerio<Element> {
  return parent.children().filter((_, el) => localNameOf(el.name) === name);
}

function collectPoints($: CheerioAPI, parent: Cheerio<Element>, ncxPath: string): NavPoint[] {
  return childrenNamed(parent, "navPoint")
    .toArray()
    .map((el) => {
      const point = $(el);
      const label = byLocalName($, "text", childrenNamed(point, "navLabel")).first().text().trim();
      const src = unescapeXml(childrenNamed(point, "content").first().attr("src") ?? "");
      return {
        label: label || escapeXml(basenameOf(src)),
        target: src ? resolveHref(src, ncxPath) : null,
        fragment: splitFragment(src).fragment,
        children: collectPoints($, point, ncxPath),
      };
    });
}

/** Table of contents entries from an NCX document, nesting preserved */
export async function readNcxPoints(cache: DocumentCache, ncxPath: string): Promise<NavPoint[]> {
  const { $ } = await cache.readXml(ncxPath);
  const navMap = byLocalName($, "navMap").first();
  return navMap.length > 0 ? collectPoints($, navMap, ncxPath) : [];
}

function hrefFrom(navPath: string, target: string, fragment: string): string {
  return escapeXml(encodeURI(relativeHref(navPath, target)) + fragment);
}

/** A label without a target is only valid as the heading of a nested list */
function prunePoints(points: NavPoint[]): NavPoint[] {
  return points
    .map((point) => ({ ...point, children: prunePoints(point.children) }))
    .filter((point) => point.target !== null || point.children.length > 0);
}

function renderPoints(points: NavPoint[], navPath: string, depth: number): string {
  const pad = "  ".repeat(depth);
  const items = points.map((point) => {
    const link = point.target
      ? `<a href="${hrefFrom(navPath, point.target, point.fragment)}">${point.label}</a>`
      : `<span>${point.label}</span>`;
    const nested =
      point.children.length > 0
        ? `\n${renderPoints(point.children, navPath, depth + 2)}\n${pad}  `
        : "";
    return `${pad}  <li>${link}${nested}</li>`;
  });
  return [`${pad}<ol>`, ...items, `${pad}</ol>`].join("\n");
}

/**
 * EPUB 3 navigation document with a toc nav and, when there are any, landmarks.
 */
export function renderNavDocument(options: {
  navPath: string;
  title: string;
  language: string;
  toc: NavPoint[];
  landmarks: Landmark[];
  /** Linked from the single toc entry written when `toc` has none */
  start: string;
}): string {
  const { navPath, title, language, landmarks, start } = options;
  const lang = escapeXml(language);
  const toc = prunePoints(options.toc);
  const entries: NavPoint[] = toc.length > 0 ? toc : [{ label: title, target: start, fragment: "", children: [] }];

  const sections = [
    `  <nav epub:type="toc" id="toc">\n    <h1>Contents</h1>\n${renderPoints(entries, navPath, 2)}\n  </nav>`,
  ];
  if (landmarks.length > 0) {
    const items = landmarks.map(
      (landmark) =>
        `      <li><a epub:type="${escapeXml(landmark.type)}" href="${hrefFrom(navPath, landmark.target, landmark.fragment)}">${landmark.label}</a></li>`,
    );
    sections.push(
      `  <nav epub:type="landmarks" id="landmarks" hidden="hidden">\n    <ol>\n${items.join("\n")}\n    </ol>\n  </nav>`,
    );
  }

  return `<?xml version="1.0" encoding="utf-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" lang="${lang}" xml:lang="${lang}">
<head>
  <title>${title}</title>
</head>
<body>
${sections.join("\n")}
</body>
</html>
`;
}
