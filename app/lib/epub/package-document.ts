import type { Cheerio, CheerioAPI } from "cheerio";
import { isTag, isText, type Element } from "domhandler";
import { PackageError } from "../errors";
import type { DocumentCache, ParsedDocument } from "../document/cache";
import { escapeXml, unescapeXml } from "../document/xml-text";
import { CONTAINER_PATH, parseContainer } from "../package/container";
import { dirnameOf, extensionOf, isValidEntryPath, relativeHref, resolveHref } from "../package/paths";
import type { PackageStore } from "../package/store";
import type { ManifestItem, SpineItem } from "../types";

export const NCX_MEDIA_TYPE = "application/x-dtbncx+xml";
export const XHTML_MEDIA_TYPE = "application/xhtml+xml";

export function localNameOf(name: string): string {
  return name.slice(name.indexOf(":") + 1);
}

/**
 * Elements matching a local name regardless of namespace prefix
 * (`item` matches both `<item>` and `<opf:item>`).
 */
export function byLocalName(
  $: CheerioAPI,
  name: string,
  scope?: Cheerio<Element>,
): Cheerio<Element> {
  const base = scope ? scope.find("*") : $.root().find("*");
  return base.filter((_, el) => localNameOf(el.name) === name);
}

/**
 * Insert an element as the last child of `parent`, keeping the
 * surrounding indentation intact.
 */
export function appendIndented(
  $: CheerioAPI,
  parent: Cheerio<Element>,
  markup: string,
  indent = "    ",
): Cheerio<Element> {
  const el = $(markup);
  const last = parent.contents().last();
  const lastNode = last.get(0);
  if (lastNode && isText(lastNode) && lastNode.data.trim() === "") {
    last.before(`\n${indent}`);
    last.before(el);
  } else {
    parent.append(el);
  }
  return el.filter((_, node): node is Element => isTag(node));
}

/** Remove elements together with the indentation preceding each */
export function removeIndented($: CheerioAPI, elements: Cheerio<Element>): void {
  elements.each((_, el) => {
    const prev = el.prev;
    if (prev && isText(prev) && prev.data.trim() === "") $(prev).remove();
  });
  elements.remove();
}

/**
 * Locate the package document: container.xml rootfile first, then the first
 * .opf entry in the package.
 */
export async function locateOpf(store: PackageStore): Promise<string | null> {
  if (await store.exists(CONTAINER_PATH)) {
    const opfPath = parseContainer((await store.get(CONTAINER_PATH)).toString("utf8"));
    if (opfPath && isValidEntryPath(opfPath) && (await store.exists(opfPath))) return opfPath;
  }
  const paths = await store.list();
  return paths.find((p) => extensionOf(p) === ".opf") ?? null;
}

export async function loadPackageDocument(cache: DocumentCache): Promise<PackageDocument> {
  const opfPath = await locateOpf(cache.store);
  if (!opfPath) {
    throw new PackageError("NotFound", "Package document (.opf) not found", { path: CONTAINER_PATH });
  }
  return new PackageDocument(opfPath, await cache.readXml(opfPath));
}

/**
 * Structured view over a parsed OPF package document.
 */
export class PackageDocument {
  readonly opfPath: string;
  readonly doc: ParsedDocument;

  constructor(opfPath: string, doc: ParsedDocument) {
    this.opfPath = opfPath;
    this.doc = doc;
  }

  get $(): CheerioAPI {
    return this.doc.$;
  }

  get opfDir(): string {
    return dirnameOf(this.opfPath);
  }

  get root(): Cheerio<Element> {
    return this.$.root().children().first();
  }

  get version(): string {
    return this.root.attr("version") ?? "2.0";
  }

  get majorVersion(): number {
    return parseInt(this.version, 10) || 2;
  }

  section(name: "metadata" | "manifest" | "spine" | "guide"): Cheerio<Element> {
    return this.root.children().filter((_, el) => localNameOf(el.name) === name).first();
  }

  ensureSection(name: "metadata" | "manifest" | "spine"): Cheerio<Element> {
    const existing = this.section(name);
    if (existing.length > 0) return existing;
    return appendIndented(this.$, this.root, `<${name}>\n  </${name}>`, "  ");
  }

  /** Resolve an href written in the OPF to a full entry path */
  resolve(href: string): string | null {
    return resolveHref(unescapeXml(href), this.opfPath);
  }

  hrefTo(path: string): string {
    return relativeHref(this.opfPath, path);
  }

  itemElements(): Cheerio<Element> {
    return byLocalName(this.$, "item", this.section("manifest"));
  }

  items(): ManifestItem[] {
    const items: ManifestItem[] = [];
    this.itemElements().each((_, el) => {
      const id = el.attribs.id;
      const href = el.attribs.href;
      if (!id || !href) return;
      items.push({
        id,
        href,
        path: this.resolve(href) ?? href,
        mediaType: el.attribs["media-type"] ?? "application/octet-stream",
        properties: (el.attribs.properties ?? "").split(/\s+/).filter(Boolean),
      });
    });
    return items;
  }

  itemById(id: string): ManifestItem | undefined {
    return this.items().find((item) => item.id === id);
  }

  itemByPath(path: string): ManifestItem | undefined {
    return this.items().find((item) => item.path === path);
  }

  itemElement(id: string): Cheerio<Element> {
    return this.itemElements().filter((_, el) => el.attribs.id === id);
  }

  /** An id not used by any element of the package document */
  uniqueId(base: string): string {
    const taken = new Set(
      this.$.root().find("*")
        .toArray()
        .map((el) => el.attribs.id)
        .filter(Boolean),
    );
    const stem = base.replace(/[^A-Za-z0-9_.-]/g, "_").replace(/^([^A-Za-z_])/, "_$1") || "item";
    if (!taken.has(stem)) return stem;
    let n = 1;
    while (taken.has(`${stem}-${n}`)) n++;
    return `${stem}-${n}`;
  }

  addItem(
    path: string,
    mediaType: string,
    options: { id?: string; properties?: string[] } = {},
  ): ManifestItem {
    const id = this.uniqueId(options.id ?? path.slice(path.lastIndexOf("/") + 1));
    const href = escapeXml(this.hrefTo(path));
    const properties = options.properties?.length
      ? ` properties="${escapeXml(options.properties.join(" "))}"`
      : "";
    appendIndented(
      this.$,
      this.ensureSection("manifest"),
      `<item id="${id}" href="${href}" media-type="${escapeXml(mediaType)}"${properties}/>`,
    );
    return { id, href, path, mediaType, properties: options.properties ?? [] };
  }

  /** Remove a manifest item and every spine reference to it */
  removeItem(id: string): void {
    removeIndented(this.$, this.itemElement(id));
    removeIndented(
      this.$,
      this.itemrefElements().filter((_, el) => el.attribs.idref === id),
    );
  }

  addProperty(id: string, property: string): void {
    const el = this.itemElement(id);
    const current = (el.attr("properties") ?? "").split(/\s+/).filter(Boolean);
    if (!current.includes(property)) {
      el.attr("properties", [...current, property].join(" "));
    }
  }

  itemrefElements(): Cheerio<Element> {
    return byLocalName(this.$, "itemref", this.section("spine"));
  }

  spine(): SpineItem[] {
    return this.itemrefElements()
      .toArray()
      .filter((el) => Boolean(el.attribs.idref))
      .map((el) => ({ idref: el.attribs.idref, linear: el.attribs.linear !== "no" }));
  }

  addSpineItem(idref: string): void {
    appendIndented(this.$, this.ensureSection("spine"), `<itemref idref="${escapeXml(idref)}"/>`);
  }

  navItem(): ManifestItem | undefined {
    return this.items().find((item) => item.properties.includes("nav"));
  }

  ncxItem(): ManifestItem | undefined {
    const tocId = this.section("spine").attr("toc");
    const items = this.items();
    return (tocId ? items.find((item) => item.id === tocId) : undefined) ??
      items.find((item) => item.mediaType === NCX_MEDIA_TYPE);
  }

  /** Markup documents in reading order, excluding the navigation document */
  spineDocumentPaths(): string[] {
    const nav = this.navItem();
    const byId = new Map(this.items().map((item) => [item.id, item]));
    const paths: string[] = [];
    for (const ref of this.spine()) {
      const item = byId.get(ref.idref);
      if (!item || item.id === nav?.id) continue;
      if (item.mediaType !== XHTML_MEDIA_TYPE && item.mediaType !== "text/html") continue;
      if (!paths.includes(item.path)) paths.push(item.path);
    }
    return paths;
  }

  metadataElements(name: string): Cheerio<Element> {
    return byLocalName(this.$, name, this.section("metadata"));
  }

  uniqueIdentifier(): string | null {
    const uidRef = this.root.attr("unique-identifier");
    const identifiers = this.metadataElements("identifier");
    const match = uidRef
      ? identifiers.filter((_, el) => el.attribs.id === uidRef).first()
      : identifiers.first();
    const value = unescapeXml(match.text()).trim();
    return value || null;
  }

  language(): string | null {
    const value = unescapeXml(this.metadataElements("language").first().text()).trim();
    return value || null;
  }

  title(): string | null {
    const value = unescapeXml(this.metadataElements("title").first().text()).trim();
    return value || null;
  }

  async save(cache: DocumentCache): Promise<void> {
    await cache.writeXml(this.opfPath, this.doc, "package");
  }
}
