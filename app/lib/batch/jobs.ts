/**
 * In-memory status tracking for batch jobs
 */

import type { PackageErrorKind } from "../errors";

export type JobStatus = "pending" | "running" | "completed" | "error" | "cancelled";

export interface JobProgress {
  id: string;
  status: JobStatus;
  progress: number; // 0-100
  message?: string;
  result?: { success: boolean; error?: string; kind?: PackageErrorKind };
  updatedAt: number;
}

export type JobListener = (progress: JobProgress) => void;

export class JobTracker {
  private jobs = new Map<string, JobProgress>();
  // subscribers per job; "*" receives every update
  private subscribers = new Map<string, Set<JobListener>>();

  /**
   * Create a new job
   */
  createJob(id: string): JobProgress {
    const job: JobProgress = {
      id,
      status: "pending",
      progress: 0,
      updatedAt: Date.now(),
    };
    this.jobs.set(id, job);
    this.notify(job);
    return job;
  }

  /**
   * Update job progress
   */
  updateJobProgress(
    id: string,
    updates: Partial<Omit<JobProgress, "id" | "updatedAt">>,
  ): JobProgress | null {
    const job = this.jobs.get(id);
    if (!job) return null;

    Object.assign(job, updates, { updatedAt: Date.now() });
    this.notify(job);
    return job;
  }

  getJob(id: string): JobProgress | null {
    const job = this.jobs.get(id);
    return job ? { ...job } : null;
  }

  /** Forget a job and its per-job subscribers */
  removeJob(id: string): void {
    this.jobs.delete(id);
    this.subscribers.delete(id);
  }

  /**
   * Subscribe to updates of one job, or of every job with "*"
   */
  subscribe(id: string, callback: JobListener): () => void {
    let subs = this.subscribers.get(id);
    if (!subs) {
      subs = new Set();
      this.subscribers.set(id, subs);
    }
    subs.add(callback);

    // Return unsubscribe function
    return () => {
      subs?.delete(callback);
      if (subs?.size === 0) {
        this.subscribers.delete(id);
      }
    };
  }

  private notify(job: JobProgress): void {
    const snapshot = { ...job };
    for (const key of [job.id, "*"]) {
      const subs = this.subscribers.get(key);
      if (!subs) continue;
      for (const callback of subs) {
        callback(snapshot);
      }
    }
  }
}
