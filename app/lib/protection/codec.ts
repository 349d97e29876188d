import { randomBytes } from "crypto";
import { DEFAULT_PROTECTED_EXTENSIONS } from "../config";
import { DocumentCache } from "../document/cache";
import { loadPackageDocument, locateOpf } from "../epub/package-document";
import { PackageError } from "../errors";
import { MIMETYPE_PATH } from "../package/container";
import { extensionOf } from "../package/paths";
import { rewriteReferences } from "../package/references";
import type { PackageStore } from "../package/store";
import type { ProtectionAlgorithm } from "../types";
import { entryChecksum, scramble } from "./algorithms";
import { readManifest, writeManifest, type ProtectedEntry } from "./manifest";
import { obfuscatedPath } from "./naming";

export interface ProtectionOptions {
  key: string;
  algorithm?: ProtectionAlgorithm;
  /** Extensions selected for protection; fonts and images by default */
  include?: string[];
  /** The job's document cache, when the store already has one */
  cache?: DocumentCache;
}

export interface ProtectionMapping {
  originalPath: string;
  protectedPath: string;
}

interface PendingMove {
  from: string;
  to: string;
  bytes: Buffer;
}

async function withCache<T>(
  store: PackageStore,
  cache: DocumentCache | undefined,
  fn: (cache: DocumentCache) => Promise<T>,
): Promise<T> {
  if (cache) return fn(cache);
  const own = new DocumentCache(store);
  try {
    return await fn(own);
  } finally {
    own.dispose();
  }
}

async function packageSalt(store: PackageStore, cache: DocumentCache, existing: ProtectedEntry[]): Promise<string> {
  if (await locateOpf(store)) {
    const identifier = (await loadPackageDocument(cache)).uniqueIdentifier();
    if (identifier) return identifier;
  }
  return existing[0]?.salt ?? randomBytes(8).toString("hex");
}

/**
 * Moves are applied only after every entry was read and checked. Moved
 * entries and entries in `untouched` keep their bytes: scrambled content
 * must not pass through reference rewriting.
 */
async function applyMoves(
  store: PackageStore,
  moves: PendingMove[],
  untouched: Iterable<string> = [],
): Promise<void> {
  const renames = new Map<string, string>();
  const skip = new Set(untouched);
  for (const move of moves) {
    await store.put(move.to, move.bytes);
    await store.delete(move.from);
    renames.set(move.from, move.to);
    skip.add(move.to);
  }
  await rewriteReferences(store, renames, skip);
}

function requireKey(key: string): void {
  if (!key) {
    throw new PackageError("InvalidConfiguration", "A protection key is required");
  }
}

/**
 * Obfuscate the paths and scramble the bytes of selected entries, recording
 * each in META-INF/encryption.xml. Entries the manifest already lists are
 * skipped.
 */
export async function protect(store: PackageStore, options: ProtectionOptions): Promise<ProtectionMapping[]> {
  requireKey(options.key);
  const algorithm = options.algorithm ?? "basic";
  const include = new Set((options.include ?? DEFAULT_PROTECTED_EXTENSIONS).map((ext) => ext.toLowerCase()));

  return withCache(store, options.cache, async (cache) => {
    const manifest = await readManifest(store);
    const salt = await packageSalt(store, cache, manifest.entries);
    const listed = new Set([
      ...manifest.foreignPaths,
      ...manifest.entries.flatMap((entry) => [entry.originalPath, entry.protectedPath]),
    ]);

    const moves: PendingMove[] = [];
    const added: ProtectedEntry[] = [];
    for (const path of await store.list()) {
      if (listed.has(path) || path === MIMETYPE_PATH || path.startsWith("META-INF/")) continue;
      if (!include.has(extensionOf(path))) continue;

      const target = obfuscatedPath(path, salt);
      if (target !== path && (await store.exists(target))) {
        throw new PackageError("ManifestInconsistent", `Protected path already in use: ${target}`, {
          path: target,
        });
      }
      const bytes = await store.get(path);
      moves.push({ from: path, to: target, bytes: scramble(algorithm, bytes, { key: options.key, salt, path }) });
      added.push({
        algorithm,
        protectedPath: target,
        originalPath: path,
        salt,
        checksum: entryChecksum(options.key, salt, bytes),
      });
    }
    if (moves.length === 0) return [];

    await applyMoves(
      store,
      moves,
      manifest.entries.map((entry) => entry.protectedPath),
    );
    await writeManifest(store, { ...manifest, entries: [...manifest.entries, ...added] });
    console.log(`[Protection] Protected ${moves.length} entries (${algorithm})`);
    return added.map(({ originalPath, protectedPath }) => ({ originalPath, protectedPath }));
  });
}

/**
 * Restore every entry the manifest lists. All entries are verified against
 * their checksums before the store is touched; a wrong key changes nothing.
 */
export async function unprotect(store: PackageStore, options: ProtectionOptions): Promise<ProtectionMapping[]> {
  requireKey(options.key);
  const manifest = await readManifest(store);
  if (manifest.entries.length === 0) return [];

  const moves: PendingMove[] = [];
  for (const entry of manifest.entries) {
    if (!(await store.exists(entry.protectedPath))) {
      throw new PackageError("ManifestInconsistent", `Protected entry missing: ${entry.protectedPath}`, {
        path: entry.protectedPath,
      });
    }
    if (entry.originalPath !== entry.protectedPath && (await store.exists(entry.originalPath))) {
      throw new PackageError("ManifestInconsistent", `Original path already in use: ${entry.originalPath}`, {
        path: entry.originalPath,
      });
    }
    const restored = scramble(entry.algorithm, await store.get(entry.protectedPath), {
      key: options.key,
      salt: entry.salt,
      path: entry.originalPath,
    });
    if (entryChecksum(options.key, entry.salt, restored) !== entry.checksum) {
      throw new PackageError("AuthenticationFailure", `Checksum mismatch for ${entry.originalPath}`, {
        path: entry.originalPath,
      });
    }
    moves.push({ from: entry.protectedPath, to: entry.originalPath, bytes: restored });
  }

  await applyMoves(store, moves);
  await writeManifest(store, { ...manifest, entries: [] });
  console.log(`[Protection] Restored ${moves.length} entries`);
  return manifest.entries.map(({ originalPath, protectedPath }) => ({ originalPath, protectedPath }));
}
