import { z } from "zod";
import { parseDocument, type DocumentCache } from "../document/cache";
import { escapeXml, unescapeXml } from "../document/xml-text";
import {
  appendIndented,
  byLocalName,
  loadPackageDocument,
  type PackageDocument,
} from "../epub/package-document";
import {
  landmarkTypeFor,
  readNcxPoints,
  renderNavDocument,
  type Landmark,
  type NavPoint,
} from "../epub/navigation";
import { basenameOf, joinEntryPath, splitFragment } from "../package/paths";
import type { PackageFilter } from "./types";

const REFINEMENTS: Record<string, { property: string; scheme?: string }> = {
  "opf:role": { property: "role", scheme: "marc:relators" },
  "opf:file-as": { property: "file-as" },
  "opf:scheme": { property: "identifier-type" },
};

/** `2024-05-01T12:00:00Z`: dcterms:modified takes no fractional seconds */
export function modifiedTimestamp(value: string | null): string {
  const date = value ? new Date(value) : new Date();
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function upgradeMetadata(opf: PackageDocument, modified: string): void {
  const { $ } = opf;
  const metadata = opf.ensureSection("metadata");
  const refines: string[] = [];

  metadata.children().each((_, el) => {
    for (const [attr, value] of Object.entries(el.attribs)) {
      if (!attr.startsWith("opf:")) continue;
      delete el.attribs[attr];
      const refinement = REFINEMENTS[attr];
      if (!refinement || !value.trim()) continue;
      if (!el.attribs.id) {
        el.attribs.id = opf.uniqueId(el.name.replace(/^dc:/, ""));
      }
      const scheme = refinement.scheme ? ` scheme="${refinement.scheme}"` : "";
      refines.push(
        `<meta refines="#${el.attribs.id}" property="${refinement.property}"${scheme}>${value}</meta>`,
      );
    }
  });
  refines.forEach((markup) => appendIndented($, metadata, markup));

  const existing = opf
    .metadataElements("meta")
    .filter((_, el) => el.attribs.property === "dcterms:modified");
  if (existing.length > 0) {
    existing.first().text(modified);
  } else {
    appendIndented($, metadata, `<meta property="dcterms:modified">${modified}</meta>`);
  }

  const coverId = opf
    .metadataElements("meta")
    .filter((_, el) => el.attribs.name === "cover")
    .first()
    .attr("content");
  if (coverId && opf.itemById(coverId)) opf.addProperty(coverId, "cover-image");
}

function guideLandmarks(opf: PackageDocument): Landmark[] {
  const landmarks: Landmark[] = [];
  byLocalName(opf.$, "reference", opf.section("guide")).each((_, el) => {
    const type = landmarkTypeFor(el.attribs.type ?? "");
    const href = el.attribs.href;
    const target = href ? opf.resolve(href) : null;
    if (!type || !href || !target) return;
    landmarks.push({
      type,
      label: el.attribs.title || escapeXml(type),
      target,
      fragment: splitFragment(unescapeXml(href)).fragment,
    });
  });
  return landmarks;
}

async function spinePoints(opf: PackageDocument, cache: DocumentCache): Promise<NavPoint[]> {
  const points: NavPoint[] = [];
  for (const path of opf.spineDocumentPaths()) {
    const { $ } = await cache.readXml(path);
    const title = byLocalName($, "title").first().text().trim();
    points.push({
      label: title || escapeXml(basenameOf(path)),
      target: path,
      fragment: "",
      children: [],
    });
  }
  return points;
}

function navPathFor(opf: PackageDocument): string {
  const taken = new Set(opf.items().map((item) => item.path));
  let name = "nav.xhtml";
  for (let n = 1; taken.has(joinEntryPath(opf.opfDir, name)); n++) name = `nav-${n}.xhtml`;
  return joinEntryPath(opf.opfDir, name);
}

async function createNavDocument(
  opf: PackageDocument,
  cache: DocumentCache,
  defaultLanguage: string,
  guessToc: boolean,
): Promise<void> {
  const ncx = opf.ncxItem();
  let toc: NavPoint[] = ncx && (await cache.store.exists(ncx.path)) ? await readNcxPoints(cache, ncx.path) : [];
  if (toc.length === 0 && guessToc) toc = await spinePoints(opf, cache);

  const navPath = navPathFor(opf);
  const text = renderNavDocument({
    navPath,
    title: escapeXml(opf.title() ?? "Contents"),
    language: opf.language() ?? defaultLanguage,
    toc,
    landmarks: guideLandmarks(opf),
    start: opf.spineDocumentPaths()[0] ?? navPath,
  });
  await cache.writeXml(navPath, await parseDocument(navPath, text), "markup");
  opf.addItem(navPath, "application/xhtml+xml", { id: "nav", properties: ["nav"] });
}

const upgradeOptions = z
  .object({
    /** Build the toc from spine document titles when the NCX gives none */
    guessToc: z.boolean().default(true),
  })
  .strict();

/**
 * EPUB 2 to EPUB 3. Packages already at version 3 are left untouched, so
 * running the filter twice equals running it once.
 */
export const versionUpgrade: PackageFilter = {
  name: "version-upgrade",
  description: "Upgrades EPUB 2 packages to EPUB 3",
  optionsSchema: upgradeOptions,
  async run({ store, cache, config, options }) {
    const { guessToc } = upgradeOptions.parse(options);
    const opf = await loadPackageDocument(cache);
    if (opf.version.trim().startsWith("3")) return;

    console.log(`[Upgrade] ${opf.opfPath}: ${opf.version} -> 3.0`);
    opf.root.attr("version", "3.0");
    upgradeMetadata(opf, modifiedTimestamp(config.upgrade.modified));

    for (const path of opf.spineDocumentPaths()) {
      if (!(await store.exists(path))) continue;
      await cache.writeXml(path, await cache.readXml(path), "markup");
    }

    if (!opf.navItem()) {
      await createNavDocument(opf, cache, config.metadata.defaultLanguage, guessToc);
    }
    await opf.save(cache);
  },
};
