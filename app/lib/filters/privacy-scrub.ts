import { loadPackageDocument, removeIndented } from "../epub/package-document";
import { NO_OPTIONS, type PackageFilter } from "./types";

/** Reader state and vendor droppings, matched against the full entry path */
export const VENDOR_ENTRY_PATTERNS: RegExp[] = [
  /(^|\/)calibre_bookmarks\.txt$/,
  /(^|\/)iTunesMetadata(-original)?\.plist$/,
  /(^|\/)iTunesArtwork$/,
  /(^|\/)\.DS_Store$/,
  /(^|\/)Thumbs\.db$/,
  /(^|\/)desktop\.ini$/,
  /^__MACOSX\//,
  /(^|\/)\._[^/]+$/,
  /\.(bookmarks|annot|progress)$/i,
];

const PRIVATE_META_NAMES = new Set([
  "calibre:timestamp",
  "calibre:user_metadata",
  "calibre:user_categories",
  "calibre:author_link_map",
  "calibre:title_sort",
  "Sigil version",
]);

export function isVendorEntry(path: string): boolean {
  return VENDOR_ENTRY_PATTERNS.some((pattern) => pattern.test(path));
}

function isPrivateMetaName(name: string): boolean {
  return PRIVATE_META_NAMES.has(name) || name.startsWith("calibre:user_metadata:");
}

export const privacyScrub: PackageFilter = {
  name: "privacy-scrub",
  description: "Removes reader-state entries and private package metadata",
  optionsSchema: NO_OPTIONS,
  async run({ store, cache }) {
    const removed: string[] = [];
    for (const path of await store.list()) {
      if (!isVendorEntry(path)) continue;
      await store.delete(path);
      removed.push(path);
    }
    if (removed.length > 0) {
      console.log(`[Privacy] Removed ${removed.length} vendor entries`);
    }

    const opf = await loadPackageDocument(cache);
    let changed = false;

    for (const item of opf.items()) {
      if (!removed.includes(item.path)) continue;
      opf.removeItem(item.id);
      changed = true;
    }

    const privateMetas = opf
      .metadataElements("meta")
      .filter((_, el) => isPrivateMetaName(el.attribs.name ?? ""));
    if (privateMetas.length > 0) {
      removeIndented(opf.$, privateMetas);
      changed = true;
    }

    if (changed) await opf.save(cache);
  },
};
