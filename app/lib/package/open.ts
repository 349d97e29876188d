import { cp, mkdir, readdir, readFile, rm, stat, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, extname, resolve } from "path";
import { v4 as uuid } from "uuid";
import { PackageError } from "../errors";
import type { StorageKind } from "../types";
import { ArchiveStore } from "./archive-store";
import { DirectoryStore } from "./directory-store";
import { copyEntries, type PackageStore } from "./store";

const ARCHIVE_EXTENSIONS = new Set([".epub", ".zip", ".kepub"]);

export interface OpenedPackage {
  store: PackageStore;
  /** Remove the working copy of a disk-backed package (no-op for memory) */
  dispose(): Promise<void>;
}

export function isArchivePath(path: string): boolean {
  return ARCHIVE_EXTENSIONS.has(extname(path).toLowerCase());
}

async function statOrFail(path: string) {
  try {
    return await stat(path);
  } catch (error) {
    throw new PackageError("IOFailure", `Cannot open package: ${path}`, { path, cause: error });
  }
}

async function readInputFile(path: string): Promise<Buffer> {
  try {
    return await readFile(path);
  } catch (error) {
    throw new PackageError("IOFailure", `Cannot read package: ${path}`, { path, cause: error });
  }
}

/**
 * Open a canonical package (zip file or directory tree) into a store.
 * "memory" materializes everything in an ArchiveStore; "disk" works on a
 * private copy in a temporary directory so the input is never modified.
 */
export async function openPackage(
  input: string,
  storage: StorageKind = "memory",
): Promise<OpenedPackage> {
  const inputPath = resolve(input);
  const info = await statOrFail(inputPath);

  if (storage === "memory") {
    if (info.isDirectory()) {
      const store = ArchiveStore.empty();
      await copyEntries(await DirectoryStore.open(inputPath), store);
      return { store, dispose: async () => {} };
    }
    const store = await ArchiveStore.fromBuffer(await readInputFile(inputPath));
    return { store, dispose: async () => {} };
  }

  const workDir = resolve(tmpdir(), `quire-${uuid()}`);
  const dispose = () => rm(workDir, { recursive: true, force: true });
  try {
    if (info.isDirectory()) {
      await cp(inputPath, workDir, { recursive: true });
      return { store: await DirectoryStore.open(workDir), dispose };
    }
    const archive = await ArchiveStore.fromBuffer(await readInputFile(inputPath));
    const store = await DirectoryStore.open(workDir, { create: true });
    await copyEntries(archive, store);
    return { store, dispose };
  } catch (error) {
    await dispose();
    if (error instanceof PackageError) throw error;
    throw new PackageError("IOFailure", `Cannot prepare working copy of ${inputPath}`, {
      path: inputPath,
      cause: error,
    });
  }
}

export async function toArchiveBuffer(store: PackageStore): Promise<Buffer> {
  if (store instanceof ArchiveStore) return store.toBuffer();
  const archive = ArchiveStore.empty();
  await copyEntries(store, archive);
  return archive.toBuffer();
}

/**
 * Export a store as a zip file (archive extensions) or a directory tree.
 * A directory target must be absent or empty.
 */
export async function exportPackage(store: PackageStore, output: string): Promise<void> {
  const outputPath = resolve(output);

  if (isArchivePath(outputPath)) {
    const buffer = await toArchiveBuffer(store);
    try {
      await mkdir(dirname(outputPath), { recursive: true });
      await writeFile(outputPath, buffer);
    } catch (error) {
      throw new PackageError("IOFailure", `Cannot write package: ${outputPath}`, {
        path: outputPath,
        cause: error,
      });
    }
    return;
  }

  const existing = await readdir(outputPath).catch(() => null);
  if (existing && existing.length > 0) {
    throw new PackageError("IOFailure", `Export directory is not empty: ${outputPath}`, {
      path: outputPath,
    });
  }
  const target = await DirectoryStore.open(outputPath, { create: true });
  await copyEntries(store, target);
}
