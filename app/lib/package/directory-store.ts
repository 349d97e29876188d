import { mkdir, readdir, readFile, stat, unlink, writeFile } from "fs/promises";
import { join, resolve } from "path";
import { PackageError } from "../errors";
import { BaseStore, notFound } from "./store";

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Package store backed by a directory tree. Entries are read and written
 * lazily against the base directory.
 */
export class DirectoryStore extends BaseStore {
  readonly kind = "directory" as const;
  readonly baseDir: string;
  // insertion order of the paths this store has seen
  private order: string[] = [];

  private constructor(baseDir: string) {
    super();
    this.baseDir = baseDir;
  }

  static async open(dir: string, options: { create?: boolean } = {}): Promise<DirectoryStore> {
    const baseDir = resolve(dir);
    try {
      if (options.create) {
        await mkdir(baseDir, { recursive: true });
      }
      const info = await stat(baseDir);
      if (!info.isDirectory()) {
        throw new PackageError("IOFailure", `Not a directory: ${baseDir}`, { path: baseDir });
      }
    } catch (error) {
      if (error instanceof PackageError) throw error;
      throw new PackageError("IOFailure", `Cannot open package directory: ${baseDir}`, {
        path: baseDir,
        cause: error,
      });
    }

    const store = new DirectoryStore(baseDir);
    store.order = await store.walk();
    return store;
  }

  private fullPath(path: string): string {
    return join(this.baseDir, ...path.split("/"));
  }

  private async walk(prefix = ""): Promise<string[]> {
    const dir = prefix ? this.fullPath(prefix) : this.baseDir;
    const dirents = await readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
      throw new PackageError("IOFailure", `Cannot read directory: ${dir}`, { path: prefix, cause: error });
    });
    const files: string[] = [];
    for (const dirent of dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))) {
      const rel = prefix ? `${prefix}/${dirent.name}` : dirent.name;
      if (dirent.isDirectory()) {
        files.push(...(await this.walk(rel)));
      } else if (dirent.isFile()) {
        files.push(rel);
      }
    }
    return files;
  }

  protected async readEntry(path: string): Promise<Buffer> {
    try {
      return await readFile(this.fullPath(path));
    } catch (error) {
      const code = errorCode(error);
      if (code === "ENOENT" || code === "EISDIR") throw notFound(path);
      throw new PackageError("IOFailure", `Cannot read entry: ${path}`, { path, cause: error });
    }
  }

  protected async writeEntry(path: string, bytes: Buffer): Promise<void> {
    const target = this.fullPath(path);
    try {
      await mkdir(join(target, ".."), { recursive: true });
      await writeFile(target, bytes);
    } catch (error) {
      throw new PackageError("IOFailure", `Cannot write entry: ${path}`, { path, cause: error });
    }
    if (!this.order.includes(path)) this.order.push(path);
  }

  protected async removeEntry(path: string): Promise<boolean> {
    try {
      await unlink(this.fullPath(path));
    } catch (error) {
      if (errorCode(error) === "ENOENT") return false;
      throw new PackageError("IOFailure", `Cannot delete entry: ${path}`, { path, cause: error });
    }
    this.order = this.order.filter((p) => p !== path);
    return true;
  }

  protected async hasEntry(path: string): Promise<boolean> {
    try {
      return (await stat(this.fullPath(path))).isFile();
    } catch {
      return false;
    }
  }

  protected async entryPaths(): Promise<string[]> {
    const onDisk = await this.walk();
    const present = new Set(onDisk);
    const known = this.order.filter((p) => present.has(p));
    const knownSet = new Set(known);
    return [...known, ...onDisk.filter((p) => !knownSet.has(p))];
  }
}
