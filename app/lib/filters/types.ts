import { z } from "zod";
import type { EngineConfig } from "../config";
import type { DocumentCache } from "../document/cache";
import type { PackageStore } from "../package/store";
import type { FilterName } from "../types";

export interface FilterContext {
  store: PackageStore;
  cache: DocumentCache;
  config: Readonly<EngineConfig>;
  /** Options from the filter's spec, already checked against its schema */
  options: Record<string, unknown>;
}

export interface PackageFilter {
  name: FilterName;
  description: string;
  /** Options a chain entry may carry; checked when the chain is built */
  optionsSchema: z.ZodTypeAny;
  run(context: FilterContext): Promise<void>;
}

export const NO_OPTIONS = z.object({}).strict();
