import { z } from "zod";
import { PackageError } from "./errors";
import type { FilterName, Platform, ProtectionAlgorithm, StorageKind } from "./types";

export interface FilterSpec {
  name: string;
  options: Record<string, unknown>;
}

export interface ProtectionSettings {
  algorithm: ProtectionAlgorithm;
  key: string | null;
  /** Lowercase extensions (with the dot) selected for protection */
  include: string[];
}

export interface EngineConfig {
  filters: FilterSpec[];
  platform: Platform;
  storage: StorageKind;
  xmlCache: boolean;
  protection: ProtectionSettings;
  concurrency: number;
  timeoutMs: number | null;
  metadata: { defaultLanguage: string };
  upgrade: { modified: string | null };
}

export const DEFAULT_PROTECTED_EXTENSIONS = [
  ".ttf",
  ".otf",
  ".woff",
  ".woff2",
  ".jpg",
  ".jpeg",
  ".png",
  ".gif",
  ".webp",
];

export const FILTER_PRESETS: Record<string, FilterName[]> = {
  default: [
    "structural-repair",
    "version-upgrade",
    "metadata-normalize",
    "style-optimize",
    "markup-optimize",
  ],
  privacy: ["privacy-scrub"],
  layout: ["layout"],
};

export const DEFAULT_CONFIG: EngineConfig = {
  filters: [],
  platform: "generic",
  storage: "memory",
  xmlCache: true,
  protection: {
    algorithm: "basic",
    key: null,
    include: DEFAULT_PROTECTED_EXTENSIONS,
  },
  concurrency: 2,
  timeoutMs: null,
  metadata: { defaultLanguage: "en" },
  upgrade: { modified: null },
};

const filterSpecSchema = z
  .object({
    name: z.string().min(1),
    options: z.record(z.unknown()).optional(),
  })
  .strict();

const filtersSchema = z.union([z.string(), z.array(z.union([z.string().min(1), filterSpecSchema]))]);

const extensionSchema = z
  .string()
  .regex(/^\.?[A-Za-z0-9]+$/, "expected a file extension")
  .transform((ext) => (ext.startsWith(".") ? ext : `.${ext}`).toLowerCase());

/** One configuration layer (file or call-time overrides); every key optional */
export const configLayerSchema = z
  .object({
    filters: filtersSchema,
    platform: z.enum(["generic", "duokan", "zhangyue", "kindle"]),
    storage: z.enum(["memory", "disk"]),
    xmlCache: z.boolean(),
    protection: z
      .object({
        algorithm: z.enum(["basic", "idpf", "adobe"]),
        key: z.string().min(1).nullable(),
        include: z.array(extensionSchema),
      })
      .partial()
      .strict(),
    concurrency: z.number().int().min(1).max(64),
    timeoutMs: z.number().int().positive().nullable(),
    metadata: z.object({ defaultLanguage: z.string().min(1) }).partial().strict(),
    upgrade: z
      .object({ modified: z.string().datetime({ offset: true }).nullable() })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type ConfigLayer = z.input<typeof configLayerSchema>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Objects merge key by key; arrays and scalars replace */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const key of Object.keys(source)) {
    const value = source[key];
    if (value === undefined) continue;
    const current = target[key];
    if (isPlainObject(value)) {
      const next: Record<string, unknown> = isPlainObject(current) ? { ...current } : {};
      deepMerge(next, value);
      target[key] = next;
    } else {
      target[key] = Array.isArray(value) ? [...value] : value;
    }
  }
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

function parseLayer(layer: unknown, label: string): Record<string, unknown> {
  const parsed = configLayerSchema.safeParse(layer);
  if (!parsed.success) {
    throw new PackageError("InvalidConfiguration", `Invalid ${label} configuration: ${formatIssues(parsed.error)}`);
  }
  const result: Record<string, unknown> = {};
  deepMerge(result, parsed.data);
  return result;
}

/**
 * Expand preset names ("default,privacy") into filter specs. Filters a preset
 * brings in are skipped when already listed; names written out explicitly are
 * kept as given, repeats and unknown names included, so the chain can reject
 * them.
 */
export function expandFilters(filters: z.output<typeof filtersSchema>): FilterSpec[] {
  const entries =
    typeof filters === "string"
      ? filters
          .split(",")
          .map((token) => token.trim())
          .filter(Boolean)
      : filters;

  const specs: FilterSpec[] = [];
  const listed = (name: string) => specs.some((spec) => spec.name === name);

  for (const entry of entries) {
    if (typeof entry !== "string") {
      specs.push({ name: entry.name, options: entry.options ?? {} });
      continue;
    }
    const preset = FILTER_PRESETS[entry];
    if (!preset) {
      specs.push({ name: entry, options: {} });
      continue;
    }
    for (const name of preset) {
      if (!listed(name)) specs.push({ name, options: {} });
    }
  }
  return specs;
}

const resolvedSchema = configLayerSchema.required({
  filters: true,
  platform: true,
  storage: true,
  xmlCache: true,
  protection: true,
  concurrency: true,
  timeoutMs: true,
  metadata: true,
  upgrade: true,
});

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}

/**
 * Merge defaults, the file layer and call-time overrides (in that order) into
 * one frozen configuration.
 */
export function resolveConfig(
  layers: { file?: unknown; overrides?: unknown } = {},
): Readonly<EngineConfig> {
  const merged: Record<string, unknown> = {};
  deepMerge(merged, { ...DEFAULT_CONFIG, filters: [] });
  if (layers.file !== undefined) deepMerge(merged, parseLayer(layers.file, "file"));
  if (layers.overrides !== undefined) deepMerge(merged, parseLayer(layers.overrides, "override"));

  const parsed = resolvedSchema.safeParse(merged);
  if (!parsed.success) {
    throw new PackageError("InvalidConfiguration", `Invalid configuration: ${parsed.error.message}`);
  }
  const { filters, protection, metadata, upgrade, ...rest } = parsed.data;

  const config: EngineConfig = {
    ...rest,
    filters: expandFilters(filters),
    protection: {
      algorithm: protection.algorithm ?? DEFAULT_CONFIG.protection.algorithm,
      key: protection.key ?? null,
      include: protection.include ?? [...DEFAULT_PROTECTED_EXTENSIONS],
    },
    metadata: { defaultLanguage: metadata.defaultLanguage ?? DEFAULT_CONFIG.metadata.defaultLanguage },
    upgrade: { modified: upgrade.modified ?? null },
  };
  return deepFreeze(config);
}
