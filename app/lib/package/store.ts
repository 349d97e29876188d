import { createHash } from "crypto";
import { PackageError } from "../errors";
import type { PackageEntry } from "../types";
import { CONTAINER_PATH, manifestPaths, parseContainer } from "./container";
import { entryKindOf, isValidEntryPath, normalizeEntryPath } from "./paths";

export type StoreChange = { type: "put" | "delete"; path: string };
export type StoreListener = (change: StoreChange) => void;

/**
 * Path-keyed byte storage for one package instance.
 * Archive- and directory-backed stores share this contract and error taxonomy.
 */
export interface PackageStore {
  readonly kind: "archive" | "directory";
  get(path: string): Promise<Buffer>;
  put(path: string, bytes: Buffer | string): Promise<void>;
  /** Returns false when nothing was stored at the path */
  delete(path: string): Promise<boolean>;
  exists(path: string): Promise<boolean>;
  /** Manifest order first, then the remainder in insertion order */
  list(): Promise<string[]>;
  contentHash(path: string): Promise<string>;
  entry(path: string): Promise<PackageEntry>;
  onChange(listener: StoreListener): () => void;
}

export abstract class BaseStore implements PackageStore {
  abstract readonly kind: "archive" | "directory";
  private listeners = new Set<StoreListener>();

  protected abstract readEntry(path: string): Promise<Buffer>;
  protected abstract writeEntry(path: string, bytes: Buffer): Promise<void>;
  protected abstract removeEntry(path: string): Promise<boolean>;
  protected abstract hasEntry(path: string): Promise<boolean>;
  /** Stored paths in insertion order */
  protected abstract entryPaths(): Promise<string[]>;

  async get(path: string): Promise<Buffer> {
    return this.readEntry(normalizeEntryPath(path));
  }

  async put(path: string, bytes: Buffer | string): Promise<void> {
    const key = normalizeEntryPath(path);
    await this.writeEntry(key, typeof bytes === "string" ? Buffer.from(bytes, "utf8") : bytes);
    this.emit({ type: "put", path: key });
  }

  async delete(path: string): Promise<boolean> {
    const key = normalizeEntryPath(path);
    const removed = await this.removeEntry(key);
    if (removed) this.emit({ type: "delete", path: key });
    return removed;
  }

  async exists(path: string): Promise<boolean> {
    return this.hasEntry(normalizeEntryPath(path));
  }

  async list(): Promise<string[]> {
    const stored = await this.entryPaths();
    const ordered = (await this.manifestOrder()).filter((p) => stored.includes(p));
    const listed = new Set(ordered);
    return [...ordered, ...stored.filter((p) => !listed.has(p))];
  }

  async contentHash(path: string): Promise<string> {
    const bytes = await this.get(path);
    return createHash("sha256").update(bytes).digest("hex");
  }

  async entry(path: string): Promise<PackageEntry> {
    const key = normalizeEntryPath(path);
    return { path: key, bytes: await this.readEntry(key), kind: entryKindOf(key) };
  }

  onChange(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(change: StoreChange): void {
    for (const listener of this.listeners) {
      listener(change);
    }
  }

  private async manifestOrder(): Promise<string[]> {
    if (!(await this.hasEntry(CONTAINER_PATH))) return [];
    const opfPath = parseContainer((await this.readEntry(CONTAINER_PATH)).toString("utf8"));
    if (!opfPath || !isValidEntryPath(opfPath) || !(await this.hasEntry(opfPath))) return [];
    const opf = (await this.readEntry(opfPath)).toString("utf8");
    return manifestPaths(opf, opfPath);
  }
}

export function notFound(path: string): PackageError {
  return new PackageError("NotFound", `Entry not found: ${path}`, { path });
}

/**
 * Copy every entry of one store into another, in list order.
 */
export async function copyEntries(from: PackageStore, to: PackageStore): Promise<number> {
  const paths = await from.list();
  for (const path of paths) {
    await to.put(path, await from.get(path));
  }
  return paths.length;
}
