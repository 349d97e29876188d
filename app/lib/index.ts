export * from "./errors";
export type * from "./types";
export {
  DEFAULT_CONFIG,
  DEFAULT_PROTECTED_EXTENSIONS,
  FILTER_PRESETS,
  configLayerSchema,
  expandFilters,
  resolveConfig,
  type ConfigLayer,
  type EngineConfig,
  type FilterSpec,
  type ProtectionSettings,
} from "./config";

export { ArchiveStore } from "./package/archive-store";
export { DirectoryStore } from "./package/directory-store";
export { copyEntries, type PackageStore, type StoreChange, type StoreListener } from "./package/store";
export { exportPackage, isArchivePath, openPackage, toArchiveBuffer, type OpenedPackage } from "./package/open";
export { normalizeEntryPath, resolveHref, relativeHref } from "./package/paths";

export { DocumentCache, parseDocument, type ParsedDocument } from "./document/cache";
export { serializeDocument } from "./document/serialize";
export { loadPackageDocument, locateOpf, PackageDocument } from "./epub/package-document";

export { FilterChain } from "./filters/chain";
export { getFilter, isFilterName, listFilters } from "./filters/registry";
export type { FilterContext, PackageFilter } from "./filters/types";
export { platformProfile, type PlatformProfile } from "./layout/platforms";

export { protect, unprotect, type ProtectionMapping, type ProtectionOptions } from "./protection/codec";
export { ENCRYPTION_PATH, readManifest, type ProtectedEntry } from "./protection/manifest";

export { BatchOrchestrator, type BatchResult, type OrchestratorOptions } from "./batch/orchestrator";
export { processPackage, type BatchJob, type JobRunner, type JobStep, type RunContext } from "./batch/pipeline";
export type { JobProgress, JobStatus } from "./batch/jobs";
