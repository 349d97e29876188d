import { escapeXml } from "../document/xml-text";
import { appendIndented, loadPackageDocument, type PackageDocument } from "../epub/package-document";
import { NO_OPTIONS, type PackageFilter } from "../filters/types";
import { joinEntryPath } from "../package/paths";
import { linkStylesheet, writeFontSheet } from "./font-faces";
import { FOOTNOTE_SHEET_NAME, hasFootnoteAsides, writeFootnoteSheet } from "./footnote-sheet";
import { restructureFootnotes } from "./footnotes";
import { platformProfile, type PlatformProfile } from "./platforms";
import { addTrackingSpans } from "./tracking";

function addPlatformMetadata(opf: PackageDocument, profile: PlatformProfile): boolean {
  let changed = false;
  for (const { name, content } of profile.metadata) {
    const exists = opf
      .metadataElements("meta")
      .filter((_, el) => el.attribs.name === name).length > 0;
    if (exists) continue;
    appendIndented(
      opf.$,
      opf.ensureSection("metadata"),
      `<meta name="${escapeXml(name)}" content="${escapeXml(content)}"/>`,
    );
    changed = true;
  }
  return changed;
}

/**
 * Platform adaptation: footnote pairs, tracking spans and generated font and
 * footnote sheets for every spine document except the navigation document.
 */
export const layoutFilter: PackageFilter = {
  name: "layout",
  description: "Adapts content documents for a reading platform",
  optionsSchema: NO_OPTIONS,
  async run({ store, cache, config }) {
    const profile = platformProfile(config.platform);
    const opf = await loadPackageDocument(cache);
    const manifestSize = opf.items().length;
    const sheetPath = await writeFontSheet(store, cache, opf);
    const footnoteSheet = joinEntryPath(opf.opfDir, FOOTNOTE_SHEET_NAME);

    let notes = 0;
    let spans = 0;
    let annotated = 0;
    for (const path of opf.spineDocumentPaths()) {
      if (!(await store.exists(path))) continue;
      const doc = await cache.readXml(path);
      notes += restructureFootnotes(doc.$, profile);
      spans += addTrackingSpans(doc.$);
      if (sheetPath) linkStylesheet(doc.$, path, sheetPath);
      if (hasFootnoteAsides(doc.$, profile)) {
        linkStylesheet(doc.$, path, footnoteSheet);
        annotated++;
      }
      await cache.writeXml(path, doc, "markup");
    }
    if (annotated > 0) await writeFootnoteSheet(store, opf, profile, footnoteSheet);
    console.log(`[Layout] ${profile.platform}: ${notes} footnotes, ${spans} tracking spans`);

    const metadataChanged = addPlatformMetadata(opf, profile);
    if (metadataChanged || opf.items().length !== manifestSize) await opf.save(cache);
  },
};
