import { v4 as uuid } from "uuid";
import { describeError, PackageError, type PackageErrorKind } from "../errors";
import { JobTracker, type JobListener, type JobProgress } from "./jobs";
import { processPackage, type BatchJob, type JobRunner, type SubmittedJob } from "./pipeline";

export interface BatchResult {
  id: string;
  input: string;
  output: string;
  success: boolean;
  error?: string;
  kind?: PackageErrorKind;
}

export interface OrchestratorOptions {
  /** Jobs in flight at once (default 2) */
  concurrency?: number;
  /** Per-job limit; null or absent for none */
  timeoutMs?: number | null;
  runner?: JobRunner;
}

/**
 * Bounded worker pool over submitted jobs. Each job's failure is captured in
 * its own result; results come back in submission order.
 */
export class BatchOrchestrator {
  private readonly concurrency: number;
  private readonly timeoutMs: number | null;
  private readonly runner: JobRunner;
  private readonly tracker = new JobTracker();

  private queue: SubmittedJob[] = [];
  private submitted: SubmittedJob[] = [];
  private results = new Map<string, BatchResult>();

  constructor(options: OrchestratorOptions = {}) {
    const concurrency = options.concurrency ?? 2;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new PackageError("InvalidConfiguration", `Invalid concurrency: ${concurrency}`);
    }
    this.concurrency = concurrency;
    this.timeoutMs = options.timeoutMs ?? null;
    this.runner = options.runner ?? processPackage;
  }

  submit(job: BatchJob): string {
    const id = uuid();
    const submitted: SubmittedJob = Object.freeze({
      ...job,
      id,
      steps: Object.freeze([...(job.steps ?? ["chain"])]),
    });
    this.queue.push(submitted);
    this.submitted.push(submitted);
    this.tracker.createJob(id);
    return id;
  }

  /** Cancel a job that has not started; returns false once it is running */
  cancel(id: string): boolean {
    const index = this.queue.findIndex((job) => job.id === id);
    if (index === -1) return false;
    const [job] = this.queue.splice(index, 1);
    const error = new PackageError("Cancelled", `Job ${id} was cancelled before it started`, {
      path: job.input,
    });
    this.finish(job, { success: false, error: describeError(error), kind: error.kind });
    return true;
  }

  subscribe(listener: JobListener, id = "*"): () => void {
    return this.tracker.subscribe(id, listener);
  }

  status(id: string): JobProgress | null {
    return this.tracker.getJob(id);
  }

  /**
   * Drain the queue with at most `concurrency` jobs in flight and return the
   * results of every job submitted since the last call, in submission order.
   * Job records are released once their results are returned.
   */
  async runAll(): Promise<BatchResult[]> {
    const batch = this.submitted;
    this.submitted = [];

    const workers = Array.from({ length: Math.min(this.concurrency, this.queue.length) }, () =>
      this.work(),
    );
    await Promise.all(workers);

    return batch.map((job) => {
      const result = this.results.get(job.id);
      this.results.delete(job.id);
      this.tracker.removeJob(job.id);
      return (
        result ?? { id: job.id, input: job.input, output: job.output, success: false, error: "Job did not run" }
      );
    });
  }

  private async work(): Promise<void> {
    for (let job = this.queue.shift(); job; job = this.queue.shift()) {
      await this.execute(job);
    }
  }

  private async execute(job: SubmittedJob): Promise<void> {
    this.tracker.updateJobProgress(job.id, { status: "running", message: "Starting" });
    console.log(`[Batch] Job ${job.id} started: ${job.input}`);

    const controller = new AbortController();
    const work = Promise.resolve().then(() =>
      this.runner(job, {
        signal: controller.signal,
        report: (progress, message) => {
          this.tracker.updateJobProgress(job.id, { progress, message });
        },
      }),
    );

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      if (this.timeoutMs === null) return;
      const limit = this.timeoutMs;
      timer = setTimeout(() => {
        controller.abort();
        reject(new PackageError("Timeout", `Job timed out after ${limit}ms`, { path: job.input }));
      }, limit);
    });

    try {
      await Promise.race([work, timeout]);
      this.finish(job, { success: true });
    } catch (error) {
      if (controller.signal.aborted) {
        console.warn(`[Batch] Job ${job.id} timed out; its slot is released before the runner settles`);
      }
      this.finish(job, {
        success: false,
        error: describeError(error),
        kind: error instanceof PackageError ? error.kind : undefined,
      });
    } finally {
      clearTimeout(timer);
    }
  }

  private finish(job: SubmittedJob, outcome: Pick<BatchResult, "success" | "error" | "kind">): void {
    const result: BatchResult = { id: job.id, input: job.input, output: job.output, ...outcome };
    this.results.set(job.id, result);

    if (result.success) {
      console.log(`[Batch] Job ${job.id} completed`);
      this.tracker.updateJobProgress(job.id, {
        status: "completed",
        progress: 100,
        message: undefined,
        result: { success: true },
      });
    } else {
      const status = result.kind === "Cancelled" ? "cancelled" : "error";
      if (status === "error") console.error(`[Batch] Job ${job.id} failed: ${result.error}`);
      this.tracker.updateJobProgress(job.id, {
        status,
        message: result.error,
        result: { success: false, error: result.error, kind: result.kind },
      });
    }
  }
}
