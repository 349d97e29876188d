import { formatIssues, type EngineConfig, type FilterSpec } from "../config";
import type { DocumentCache } from "../document/cache";
import { FilterFailure, PackageError } from "../errors";
import type { PackageStore } from "../package/store";
import type { ChainResult, FilterName } from "../types";
import { getFilter } from "./registry";
import type { PackageFilter } from "./types";

interface ChainStep {
  filter: PackageFilter;
  options: Record<string, unknown>;
}

/**
 * Ordered composition of registered filters. Names are resolved once when the
 * chain is built; a run stops at the first failing filter.
 */
export class FilterChain {
  private readonly steps: ChainStep[];

  private constructor(steps: ChainStep[]) {
    this.steps = steps;
  }

  static build(specs: readonly (FilterSpec | string)[]): FilterChain {
    const steps: ChainStep[] = [];
    const seen = new Set<string>();
    for (const spec of specs) {
      const { name, options } = typeof spec === "string" ? { name: spec, options: {} } : spec;
      if (seen.has(name)) {
        throw new PackageError("InvalidConfiguration", `Duplicate filter in chain: ${name}`);
      }
      seen.add(name);
      const filter = getFilter(name);
      if (!filter) {
        throw new PackageError("InvalidConfiguration", `Unknown filter: ${name}`);
      }
      const parsed = filter.optionsSchema.safeParse(options);
      if (!parsed.success) {
        throw new PackageError("InvalidConfiguration", `Invalid options for ${name}: ${formatIssues(parsed.error)}`);
      }
      steps.push({ filter, options });
    }
    return new FilterChain(steps);
  }

  get names(): FilterName[] {
    return this.steps.map((step) => step.filter.name);
  }

  get isEmpty(): boolean {
    return this.steps.length === 0;
  }

  async run(
    store: PackageStore,
    cache: DocumentCache,
    config: Readonly<EngineConfig>,
  ): Promise<ChainResult> {
    const applied: FilterName[] = [];
    for (const { filter, options } of this.steps) {
      try {
        await filter.run({ store, cache, config, options });
      } catch (error) {
        const failure = new FilterFailure(filter.name, error);
        console.error(`[Chain] ${failure.message}`);
        return { success: false, applied, failure };
      }
      applied.push(filter.name);
      console.log(`[Chain] Applied ${filter.name}`);
    }
    return { success: true, applied };
  }
}
