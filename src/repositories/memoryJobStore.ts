import { randomUUID } from "node:crypto";
import { AnalysisJob, AnalysisResult, JobStatus, StatusUpdate } from "../types/job";
import { CreateCompletedInput, CreateJobInput, JobStore } from "./jobStore";

interface MemoryJobStoreOptions {
  now?: () => Date;
  generateId?: () => string;
}

/**
 * In-process job store. Rows are frozen and replaced wholesale on every write,
 * so a reader holding a row never sees it change underneath.
 */
export class MemoryJobStore implements JobStore {
  private readonly rows = new Map<string, AnalysisJob>();
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: MemoryJobStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async create(input: CreateJobInput): Promise<AnalysisJob> {
    const timestamp = this.now().toISOString();
    const job: AnalysisJob = {
      id: this.generateId(),
      request_fingerprint: input.fingerprint,
      input_question: input.question,
      status: "QUEUED",
      progress: 0,
      current_step: null,
      error_message: null,
      result_payload: null,
      cached_from: input.cachedFrom ?? null,
      created_at: timestamp,
      updated_at: timestamp,
      completed_at: null,
    };
    return this.put(job);
  }

  async createCompleted(input: CreateCompletedInput): Promise<AnalysisJob> {
    const timestamp = this.now().toISOString();
    return this.put({
      id: this.generateId(),
      request_fingerprint: input.fingerprint,
      input_question: input.question,
      status: "COMPLETE",
      progress: 100,
      current_step: null,
      error_message: null,
      result_payload: input.payload,
      cached_from: input.cachedFrom,
      created_at: timestamp,
      updated_at: timestamp,
      completed_at: timestamp,
    });
  }

  async get(jobId: string): Promise<AnalysisJob | null> {
    return this.rows.get(jobId) ?? null;
  }

  async updateStatus(
    jobId: string,
    from: JobStatus,
    update: StatusUpdate,
  ): Promise<AnalysisJob | null> {
    const current = this.rows.get(jobId);
    if (!current || current.status !== from) {
      return null;
    }
    const timestamp = this.now().toISOString();
    const failed = update.status === "ERROR";
    return this.put({
      ...current,
      status: update.status,
      progress: Math.max(current.progress, update.progress),
      current_step: update.currentStep,
      error_message: failed ? update.errorMessage ?? "Unknown error" : null,
      completed_at: failed ? timestamp : current.completed_at,
      updated_at: timestamp,
    });
  }

  async setResult(
    jobId: string,
    from: JobStatus,
    payload: AnalysisResult,
  ): Promise<AnalysisJob | null> {
    const current = this.rows.get(jobId);
    if (!current || current.status !== from) {
      return null;
    }
    const timestamp = this.now().toISOString();
    return this.put({
      ...current,
      status: "COMPLETE",
      progress: 100,
      current_step: null,
      error_message: null,
      result_payload: payload,
      completed_at: timestamp,
      updated_at: timestamp,
    });
  }

  async findFreshByFingerprint(fingerprint: string, ttlMs: number): Promise<AnalysisJob | null> {
    const cutoff = this.now().getTime() - ttlMs;
    let freshest: AnalysisJob | null = null;
    let freshestMs = Number.NEGATIVE_INFINITY;
    for (const job of this.rows.values()) {
      if (
        job.request_fingerprint !== fingerprint ||
        job.status !== "COMPLETE" ||
        job.cached_from !== null ||
        !job.completed_at
      ) {
        continue;
      }
      const completedMs = Date.parse(job.completed_at);
      if (completedMs < cutoff) {
        continue;
      }
      if (completedMs > freshestMs) {
        freshest = job;
        freshestMs = completedMs;
      }
    }
    return freshest;
  }

  async listRecent(limit: number): Promise<AnalysisJob[]> {
    return [...this.rows.values()]
      .sort((a, b) => Date.parse(b.created_at) - Date.parse(a.created_at))
      .slice(0, limit);
  }

  private put(job: AnalysisJob): AnalysisJob {
    const frozen = Object.freeze(job);
    this.rows.set(job.id, frozen);
    return frozen;
  }
}
