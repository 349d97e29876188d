import type { FilterFailure } from "./errors";

export type EntryKind = "binary" | "text" | "markup";

export interface PackageEntry {
  path: string;
  bytes: Buffer;
  kind: EntryKind;
}

export type StorageKind = "memory" | "disk";

export type Platform = "generic" | "duokan" | "zhangyue" | "kindle";

export type SerializationMode = "package" | "markup" | "xml";

export type ProtectionAlgorithm = "basic" | "idpf" | "adobe";

export type FilterName =
  | "structural-repair"
  | "version-upgrade"
  | "privacy-scrub"
  | "metadata-normalize"
  | "style-optimize"
  | "markup-optimize"
  | "layout";

export interface ManifestItem {
  id: string;
  href: string; // as written in the OPF, relative to opfDir
  path: string; // full entry path (e.g., "OEBPS/Text/chapter-1.xhtml")
  mediaType: string;
  properties: string[];
}

export interface SpineItem {
  idref: string;
  linear: boolean;
}

export interface ChainResult {
  success: boolean;
  applied: FilterName[];
  failure?: FilterFailure;
}
