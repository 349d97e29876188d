import JSZip from "jszip";
import { PackageError } from "../errors";
import { CONTAINER_PATH, EPUB_MIMETYPE, MIMETYPE_PATH } from "./container";
import { isValidEntryPath } from "./paths";
import { BaseStore, notFound } from "./store";
import { findDuplicateNames, readCentralDirectoryNames } from "./zip-inspect";

interface StoredEntry {
  bytes: Buffer;
  date: Date;
}

/**
 * Package store fully materialized in memory, built from and flattened to a zip blob.
 */
export class ArchiveStore extends BaseStore {
  readonly kind = "archive" as const;
  private entries = new Map<string, StoredEntry>();

  static empty(): ArchiveStore {
    return new ArchiveStore();
  }

  static async fromBuffer(buffer: Buffer): Promise<ArchiveStore> {
    const names = readCentralDirectoryNames(buffer);
    if (names) {
      const duplicates = findDuplicateNames(names);
      if (duplicates.length > 0) {
        throw new PackageError("CorruptArchive", `Duplicate archive entries: ${duplicates.join(", ")}`, {
          path: duplicates[0],
        });
      }
      // jszip sanitizes names on load, so unsafe ones are caught here
      const unsafe = names.find((name) => !isValidEntryPath(name.replace(/\\/g, "/").replace(/\/$/, "")));
      if (unsafe !== undefined) {
        throw new PackageError("CorruptArchive", `Unsafe entry path in archive: ${unsafe}`, { path: unsafe });
      }
    }

    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(buffer, { checkCRC32: true });
    } catch (error) {
      throw new PackageError("CorruptArchive", "Unreadable archive", { cause: error });
    }

    const store = new ArchiveStore();
    for (const file of Object.values(zip.files)) {
      if (file.dir) continue;
      const path = file.name.replace(/\\/g, "/");
      if (!isValidEntryPath(path)) {
        throw new PackageError("CorruptArchive", `Unsafe entry path in archive: ${file.name}`, {
          path: file.name,
        });
      }
      let bytes: Buffer;
      try {
        bytes = await file.async("nodebuffer");
      } catch (error) {
        throw new PackageError("CorruptArchive", `Unreadable archive entry: ${path}`, { path, cause: error });
      }
      store.entries.set(path, { bytes, date: file.date });
    }
    return store;
  }

  /**
   * Flatten to a zip blob. For EPUB packages the mimetype marker is written
   * first and uncompressed with its exact required bytes.
   */
  async toBuffer(): Promise<Buffer> {
    const zip = new JSZip();
    const paths = await this.list();
    const isEpub = this.entries.has(MIMETYPE_PATH) || this.entries.has(CONTAINER_PATH);

    if (isEpub) {
      const marker = this.entries.get(MIMETYPE_PATH);
      if (!marker || marker.bytes.toString("latin1") !== EPUB_MIMETYPE) {
        console.warn("[Store] Regenerating mimetype marker");
      }
      zip.file(MIMETYPE_PATH, EPUB_MIMETYPE, {
        compression: "STORE",
        date: marker?.date,
      });
    }

    for (const path of paths) {
      if (isEpub && path === MIMETYPE_PATH) continue;
      const entry = this.entries.get(path);
      if (!entry) continue;
      zip.file(path, entry.bytes, { date: entry.date, binary: true });
    }

    return zip.generateAsync({
      type: "nodebuffer",
      compression: "DEFLATE",
      compressionOptions: { level: 6 },
    });
  }

  protected async readEntry(path: string): Promise<Buffer> {
    const entry = this.entries.get(path);
    if (!entry) throw notFound(path);
    return entry.bytes;
  }

  protected async writeEntry(path: string, bytes: Buffer): Promise<void> {
    const previous = this.entries.get(path);
    // unchanged content keeps its timestamp so exports stay byte-stable
    const date = previous && previous.bytes.equals(bytes) ? previous.date : new Date();
    this.entries.set(path, { bytes: Buffer.from(bytes), date });
  }

  protected async removeEntry(path: string): Promise<boolean> {
    return this.entries.delete(path);
  }

  protected async hasEntry(path: string): Promise<boolean> {
    return this.entries.has(path);
  }

  protected async entryPaths(): Promise<string[]> {
    return [...this.entries.keys()];
  }
}
