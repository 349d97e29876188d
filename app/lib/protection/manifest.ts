import { parseDocument } from "../document/cache";
import { escapeXml, unescapeXml } from "../document/xml-text";
import { byLocalName } from "../epub/package-document";
import { PackageError } from "../errors";
import type { PackageStore } from "../package/store";
import type { ProtectionAlgorithm } from "../types";
import { ALGORITHM_URIS, algorithmForUri } from "./algorithms";

export const ENCRYPTION_PATH = "META-INF/encryption.xml";
export const PROTECTION_NS = "urn:quire:protection";

const CONTAINER_NS = "urn:oasis:names:tc:opendocument:xmlns:container";
const XMLENC_NS = "http://www.w3.org/2001/04/xmlenc#";

export interface ProtectedEntry {
  algorithm: ProtectionAlgorithm;
  /** Current (obfuscated) entry path */
  protectedPath: string;
  originalPath: string;
  salt: string;
  checksum: string;
}

export interface ProtectionManifest {
  entries: ProtectedEntry[];
  /** EncryptedData elements written by other tools, kept verbatim */
  foreign: string[];
  /** Entry paths referenced by foreign elements */
  foreignPaths: string[];
  /** Namespace declarations of the original root, needed by foreign elements */
  namespaces: Record<string, string>;
}

export function emptyManifest(): ProtectionManifest {
  return { entries: [], foreign: [], foreignPaths: [], namespaces: {} };
}

export async function readManifest(store: PackageStore): Promise<ProtectionManifest> {
  const manifest = emptyManifest();
  if (!(await store.exists(ENCRYPTION_PATH))) return manifest;

  const { $ } = await parseDocument(ENCRYPTION_PATH, (await store.get(ENCRYPTION_PATH)).toString("utf8"));
  const root = $.root().children().first();
  for (const [name, value] of Object.entries(root.get(0)?.attribs ?? {})) {
    if (name.startsWith("xmlns:")) manifest.namespaces[name] = value;
  }

  byLocalName($, "EncryptedData").each((_, el) => {
    const data = $(el);
    const text = (name: string) => unescapeXml(byLocalName($, name, data).first().text()).trim();
    const uri = unescapeXml(byLocalName($, "CipherReference", data).first().attr("URI") ?? "");
    const originalPath = text("original-path");

    if (!originalPath) {
      manifest.foreign.push($.xml(el));
      if (uri) manifest.foreignPaths.push(uri);
      return;
    }

    const methodUri = byLocalName($, "EncryptionMethod", data).first().attr("Algorithm") ?? "";
    const algorithm = algorithmForUri(methodUri);
    if (!algorithm || !uri) {
      throw new PackageError(
        "ManifestInconsistent",
        `Unreadable protection record for ${originalPath}`,
        { path: ENCRYPTION_PATH },
      );
    }
    manifest.entries.push({
      algorithm,
      protectedPath: uri,
      originalPath,
      salt: text("salt"),
      checksum: text("checksum"),
    });
  });
  return manifest;
}

function renderEntry(entry: ProtectedEntry): string {
  return `  <enc:EncryptedData>
    <enc:EncryptionMethod Algorithm="${escapeXml(ALGORITHM_URIS[entry.algorithm])}"/>
    <enc:CipherData>
      <enc:CipherReference URI="${escapeXml(entry.protectedPath)}"/>
    </enc:CipherData>
    <enc:EncryptionProperties>
      <enc:EncryptionProperty>
        <quire:original-path>${escapeXml(entry.originalPath)}</quire:original-path>
        <quire:salt>${escapeXml(entry.salt)}</quire:salt>
        <quire:checksum>${escapeXml(entry.checksum)}</quire:checksum>
      </enc:EncryptionProperty>
    </enc:EncryptionProperties>
  </enc:EncryptedData>`;
}

export function renderManifest(manifest: ProtectionManifest): string {
  const namespaces: Record<string, string> = {
    ...manifest.namespaces,
    "xmlns:enc": XMLENC_NS,
    "xmlns:quire": PROTECTION_NS,
  };
  const attrs = Object.entries(namespaces)
    .map(([name, value]) => ` ${name}="${escapeXml(value)}"`)
    .join("");
  const body = [...manifest.foreign.map((xml) => `  ${xml}`), ...manifest.entries.map(renderEntry)];
  return `<?xml version="1.0" encoding="utf-8"?>
<encryption xmlns="${CONTAINER_NS}"${attrs}>
${body.join("\n")}
</encryption>
`;
}

/** Write the manifest, or delete it once nothing is listed */
export async function writeManifest(store: PackageStore, manifest: ProtectionManifest): Promise<void> {
  if (manifest.entries.length === 0 && manifest.foreign.length === 0) {
    await store.delete(ENCRYPTION_PATH);
    return;
  }
  await store.put(ENCRYPTION_PATH, renderManifest(manifest));
}
