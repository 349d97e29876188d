import { z } from "zod";
import { PackageError } from "../errors";
import {
  loadPackageDocument,
  locateOpf,
  removeIndented,
  XHTML_MEDIA_TYPE,
  type PackageDocument,
} from "../epub/package-document";
import { CONTAINER_PATH, EPUB_MIMETYPE, MIMETYPE_PATH, containerXml, parseContainer } from "../package/container";
import { basenameOf, extensionOf, isExternalHref, mediaTypeMatches, mediaTypeOf } from "../package/paths";
import type { PackageStore } from "../package/store";
import type { PackageFilter } from "./types";

const repairOptions = z
  .object({
    /** Correct declared media types from entry extensions */
    mediaTypes: z.boolean().default(true),
    /** Drop dangling or repeated itemrefs and fill an empty spine */
    spine: z.boolean().default(true),
    /** Point spine@toc at the NCX item */
    ncx: z.boolean().default(true),
  })
  .strict();

type RepairOptions = z.output<typeof repairOptions>;

async function repairMimetype(store: PackageStore): Promise<boolean> {
  if (await store.exists(MIMETYPE_PATH)) {
    const marker = (await store.get(MIMETYPE_PATH)).toString("utf8");
    if (marker === EPUB_MIMETYPE) return false;
  }
  await store.put(MIMETYPE_PATH, EPUB_MIMETYPE);
  return true;
}

async function repairContainer(store: PackageStore): Promise<string> {
  const opfPath = await locateOpf(store);
  if (!opfPath) {
    throw new PackageError("NotFound", "Package document (.opf) not found", { path: CONTAINER_PATH });
  }
  const current = (await store.exists(CONTAINER_PATH))
    ? parseContainer((await store.get(CONTAINER_PATH)).toString("utf8"))
    : null;
  if (current !== opfPath) {
    console.warn(`[Repair] Regenerating ${CONTAINER_PATH} for ${opfPath}`);
    await store.put(CONTAINER_PATH, containerXml(opfPath));
  }
  return opfPath;
}

function isPackageInternal(path: string, opfPath: string): boolean {
  return (
    path === MIMETYPE_PATH ||
    path === opfPath ||
    path.startsWith("META-INF/") ||
    extensionOf(path) === ".opf" ||
    basenameOf(path).startsWith(".")
  );
}

async function repairManifest(
  store: PackageStore,
  opf: PackageDocument,
  options: RepairOptions,
): Promise<boolean> {
  let changed = false;
  const seenIds = new Set<string>();
  const seenPaths = new Set<string>();

  for (const el of opf.itemElements().toArray()) {
    const { id, href } = el.attribs;
    const external = href !== undefined && isExternalHref(href);
    const target = href && !external ? opf.resolve(href) : null;

    const drop =
      !id ||
      !href ||
      seenIds.has(id) ||
      (!external && (target === null || seenPaths.has(target) || !(await store.exists(target))));

    if (drop) {
      console.warn(`[Repair] Dropping manifest item ${id ?? "(no id)"} -> ${href ?? "(no href)"}`);
      // dangling spine references go in repairSpine
      removeIndented(opf.$, opf.$(el));
      changed = true;
      continue;
    }
    seenIds.add(id);
    if (target) {
      seenPaths.add(target);
      if (!options.mediaTypes) continue;
      const declared = el.attribs["media-type"] ?? "";
      const expected = mediaTypeOf(target);
      if (expected && !mediaTypeMatches(declared, target)) {
        el.attribs["media-type"] = expected;
        changed = true;
      }
    }
  }

  for (const path of await store.list()) {
    if (seenPaths.has(path) || isPackageInternal(path, opf.opfPath)) continue;
    const mediaType = mediaTypeOf(path);
    if (!mediaType) continue;
    opf.addItem(path, mediaType);
    seenPaths.add(path);
    changed = true;
  }
  return changed;
}

function repairItemrefs(opf: PackageDocument): boolean {
  let changed = false;
  const ids = new Set(opf.items().map((item) => item.id));
  const seen = new Set<string>();
  for (const el of opf.itemrefElements().toArray()) {
    const idref = el.attribs.idref;
    if (!idref || !ids.has(idref) || seen.has(idref)) {
      removeIndented(opf.$, opf.$(el));
      changed = true;
      continue;
    }
    seen.add(idref);
  }

  if (seen.size === 0) {
    const nav = opf.navItem();
    for (const item of opf.items()) {
      if (item.id === nav?.id || item.mediaType !== XHTML_MEDIA_TYPE) continue;
      opf.addSpineItem(item.id);
      changed = true;
    }
  }
  return changed;
}

function linkNcx(opf: PackageDocument): boolean {
  let changed = false;
  const ncx = opf.ncxItem();
  const spine = opf.section("spine");
  if (ncx && spine.length > 0 && spine.attr("toc") !== ncx.id) {
    spine.attr("toc", ncx.id);
    changed = true;
  }
  return changed;
}

export const structuralRepair: PackageFilter = {
  name: "structural-repair",
  description: "Regenerates required entries and fixes manifest and spine references",
  optionsSchema: repairOptions,
  async run({ store, cache, options }) {
    const settings = repairOptions.parse(options);
    await repairMimetype(store);
    await repairContainer(store);

    const opf = await loadPackageDocument(cache);
    const manifestChanged = await repairManifest(store, opf, settings);
    const spineChanged = settings.spine && repairItemrefs(opf);
    const ncxChanged = settings.ncx && linkNcx(opf);
    if (manifestChanged || spineChanged || ncxChanged) await opf.save(cache);
  },
};
