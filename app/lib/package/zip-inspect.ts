import { PackageError } from "../errors";

const EOCD_SIGNATURE = 0x06054b50;
const CENTRAL_HEADER_SIGNATURE = 0x02014b50;
const EOCD_MIN_SIZE = 22;
const MAX_COMMENT_SIZE = 0xffff;

/**
 * Locate the End of Central Directory record.
 * Searches the last 65KB + 22 bytes (max comment size + EOCD size).
 */
function findEndOfCentralDirectory(buffer: Buffer): number {
  if (buffer.length < EOCD_MIN_SIZE) return -1;
  // PK signature at start
  if (buffer[0] !== 0x50 || buffer[1] !== 0x4b) return -1;

  const searchStart = Math.max(0, buffer.length - (MAX_COMMENT_SIZE + EOCD_MIN_SIZE));
  for (let i = buffer.length - EOCD_MIN_SIZE; i >= searchStart; i--) {
    if (buffer.readUInt32LE(i) === EOCD_SIGNATURE) return i;
  }
  return -1;
}

/**
 * Read entry names straight from the central directory.
 * Returns null for ZIP64 archives, whose directory JSZip validates itself.
 */
export function readCentralDirectoryNames(buffer: Buffer): string[] | null {
  const eocd = findEndOfCentralDirectory(buffer);
  if (eocd === -1) {
    throw new PackageError("CorruptArchive", "Not a zip archive: end of central directory not found");
  }

  const count = buffer.readUInt16LE(eocd + 10);
  const offset = buffer.readUInt32LE(eocd + 16);
  if (count === 0xffff || offset === 0xffffffff) return null;

  const names: string[] = [];
  let cursor = offset;
  for (let i = 0; i < count; i++) {
    if (cursor + 46 > buffer.length || buffer.readUInt32LE(cursor) !== CENTRAL_HEADER_SIGNATURE) {
      throw new PackageError("CorruptArchive", `Unreadable central directory at entry ${i}`);
    }
    const flags = buffer.readUInt16LE(cursor + 8);
    const nameLength = buffer.readUInt16LE(cursor + 28);
    const extraLength = buffer.readUInt16LE(cursor + 30);
    const commentLength = buffer.readUInt16LE(cursor + 32);
    const nameBytes = buffer.subarray(cursor + 46, cursor + 46 + nameLength);
    // bit 11: file name is UTF-8
    names.push(nameBytes.toString(flags & 0x800 ? "utf8" : "latin1"));
    cursor += 46 + nameLength + extraLength + commentLength;
  }
  return names;
}

/**
 * Names that occur more than once in the central directory.
 */
export function findDuplicateNames(names: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    const key = name.replace(/\\/g, "/");
    if (seen.has(key)) duplicates.add(key);
    seen.add(key);
  }
  return [...duplicates];
}
