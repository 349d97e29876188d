import { rename, rm } from "fs/promises";
import { basename, dirname, join, resolve } from "path";
import { v4 as uuid } from "uuid";
import type { EngineConfig } from "../config";
import { DocumentCache } from "../document/cache";
import { PackageError } from "../errors";
import { FilterChain } from "../filters/chain";
import { exportPackage, openPackage } from "../package/open";
import type { PackageStore } from "../package/store";
import { protect, unprotect } from "../protection/codec";

export type JobStep = "chain" | "protect" | "unprotect";

export interface BatchJob {
  input: string;
  output: string;
  config: Readonly<EngineConfig>;
  /** Caller-ordered steps; defaults to running the filter chain */
  steps?: JobStep[];
}

export type SubmittedJob = Readonly<Omit<BatchJob, "steps">> & {
  readonly id: string;
  readonly steps: readonly JobStep[];
};

export interface RunContext {
  /** Aborted when the job times out; no export happens after that */
  signal: AbortSignal;
  report(progress: number, message: string): void;
}

export type JobRunner = (job: SubmittedJob, context: RunContext) => Promise<void>;

function throwIfAborted(signal: AbortSignal, job: SubmittedJob): void {
  if (signal.aborted) {
    throw new PackageError("Timeout", `Job ${job.id} timed out`, { path: job.input });
  }
}

function protectionKey(config: Readonly<EngineConfig>): string {
  const key = config.protection.key;
  if (!key) {
    throw new PackageError("InvalidConfiguration", "protection.key is required for protect/unprotect");
  }
  return key;
}

/**
 * Export beside the output under a temporary name and move it into place only
 * while the job is still live, so a timed-out job leaves no output.
 */
async function exportStaged(
  job: SubmittedJob,
  store: PackageStore,
  signal: AbortSignal,
): Promise<void> {
  const output = resolve(job.output);
  const staging = join(dirname(output), `.${uuid()}-${basename(output)}`);
  try {
    await exportPackage(store, staging);
    throwIfAborted(signal, job);
    await rename(staging, output).catch((error: unknown) => {
      throw new PackageError("IOFailure", `Cannot write package: ${output}`, { path: output, cause: error });
    });
  } finally {
    await rm(staging, { recursive: true, force: true });
  }
}

/**
 * Default job runner: open the input into a fresh store, run the steps in
 * order, export. The working copy is disposed whatever the outcome.
 */
export async function processPackage(job: SubmittedJob, context: RunContext): Promise<void> {
  const { config } = job;
  // resolve filter names before touching the input
  const chain = job.steps.includes("chain") ? FilterChain.build(config.filters) : null;

  const opened = await openPackage(job.input, config.storage);
  const cache = new DocumentCache(opened.store, { enabled: config.xmlCache });
  try {
    for (const [index, step] of job.steps.entries()) {
      throwIfAborted(context.signal, job);
      context.report(Math.round((index / (job.steps.length + 1)) * 100), `Running ${step}`);

      if (step === "chain" && chain) {
        const result = await chain.run(opened.store, cache, config);
        if (result.failure) throw result.failure;
      } else if (step === "protect") {
        await protect(opened.store, {
          key: protectionKey(config),
          algorithm: config.protection.algorithm,
          include: config.protection.include,
          cache,
        });
      } else if (step === "unprotect") {
        await unprotect(opened.store, { key: protectionKey(config), cache });
      }
    }

    throwIfAborted(context.signal, job);
    context.report(Math.round((job.steps.length / (job.steps.length + 1)) * 100), "Exporting");
    await exportStaged(job, opened.store, context.signal);
  } finally {
    cache.dispose();
    await opened.dispose();
  }
}
