import { load, type CheerioAPI } from "cheerio";
import { parseStringPromise } from "xml2js";
import { PackageError } from "../errors";
import { normalizeEntryPath } from "../package/paths";
import type { PackageStore } from "../package/store";
import type { SerializationMode } from "../types";
import { serializeDocument } from "./serialize";

export interface ParsedDocument {
  readonly path: string;
  readonly $: CheerioAPI;
}

const XML_ENTITIES = new Set(["amp", "lt", "gt", "quot", "apos"]);

/**
 * Strict well-formedness check. Named HTML entities (&nbsp; ...) are common in
 * XHTML content documents and are tolerated here; they are kept verbatim in
 * the tree because entities are never decoded.
 */
async function assertWellFormed(text: string, path: string): Promise<void> {
  if (text.trim() === "") {
    throw new PackageError("MalformedMarkup", `Empty document: ${path}`, { path });
  }
  const gated = text.replace(/&([a-zA-Z][a-zA-Z0-9]*);/g, (match, name: string) =>
    XML_ENTITIES.has(name) ? match : "&amp;",
  );
  try {
    await parseStringPromise(gated, { strict: true });
  } catch (error) {
    const detail = error instanceof Error ? error.message.split("\n")[0] : String(error);
    throw new PackageError("MalformedMarkup", `Malformed markup in ${path}: ${detail}`, {
      path,
      cause: error,
    });
  }
}

export function loadXml(text: string): CheerioAPI {
  return load(text, { xml: { xmlMode: true, decodeEntities: false } });
}

/**
 * Build a document from markup text; used for entries the engine creates.
 */
export async function parseDocument(path: string, text: string): Promise<ParsedDocument> {
  const source = text.replace(/^\uFEFF/, "");
  await assertWellFormed(source, path);
  return { path, $: loadXml(source) };
}

/**
 * Lazily parses XML/markup entries of one store and memoizes the trees.
 *
 * All structured access to a store should go through a single cache. Writes
 * that bypass it are observed through the store's change listener and drop the
 * cached tree for that path.
 */
export class DocumentCache {
  readonly store: PackageStore;
  private readonly enabled: boolean;
  private documents = new Map<string, Promise<ParsedDocument>>();
  private writing = new Set<string>();
  private unsubscribe: () => void;

  constructor(store: PackageStore, options: { enabled?: boolean } = {}) {
    this.store = store;
    this.enabled = options.enabled ?? true;
    this.unsubscribe = store.onChange(({ path }) => {
      if (!this.writing.has(path)) this.documents.delete(path);
    });
  }

  async readXml(path: string): Promise<ParsedDocument> {
    const key = normalizeEntryPath(path);
    const cached = this.documents.get(key);
    if (cached) return cached;

    const pending = this.store.get(key).then((bytes) => parseDocument(key, bytes.toString("utf8")));
    if (!this.enabled) return pending;

    this.documents.set(key, pending);
    try {
      return await pending;
    } catch (error) {
      // a failed parse must not poison later reads
      if (this.documents.get(key) === pending) this.documents.delete(key);
      throw error;
    }
  }

  async writeXml(path: string, doc: ParsedDocument, mode: SerializationMode): Promise<void> {
    const key = normalizeEntryPath(path);
    const text = serializeDocument(doc.$, mode, key);
    const written: ParsedDocument = doc.path === key ? doc : { path: key, $: doc.$ };

    this.writing.add(key);
    try {
      await this.store.put(key, text);
    } finally {
      this.writing.delete(key);
    }
    if (this.enabled) {
      this.documents.set(key, Promise.resolve(written));
    } else {
      this.documents.delete(key);
    }
  }

  isCached(path: string): boolean {
    return this.documents.has(normalizeEntryPath(path));
  }

  invalidate(path: string): void {
    this.documents.delete(normalizeEntryPath(path));
  }

  clear(): void {
    this.documents.clear();
  }

  /** Stop observing the store */
  dispose(): void {
    this.unsubscribe();
    this.documents.clear();
  }
}
