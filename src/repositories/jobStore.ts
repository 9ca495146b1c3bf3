import { AnalysisJob, AnalysisResult, JobStatus, StatusUpdate } from "../types/job";

export interface CreateJobInput {
  question: string;
  fingerprint: string;
  cachedFrom?: string;
}

export interface CreateCompletedInput {
  question: string;
  fingerprint: string;
  cachedFrom: string;
  payload: AnalysisResult;
}

/**
 * Persistence contract for analysis jobs.
 *
 * Every write is a single atomic step guarded by the status the caller expects
 * the row to be in; a write whose guard no longer holds returns `null` and
 * changes nothing. Readers always observe whole rows.
 */
export interface JobStore {
  create(input: CreateJobInput): Promise<AnalysisJob>;
  /** Inserts a cache copy already in `COMPLETE`, in one step. */
  createCompleted(input: CreateCompletedInput): Promise<AnalysisJob>;
  get(jobId: string): Promise<AnalysisJob | null>;
  /** Entering `ERROR` stamps `completed_at`. Progress is never lowered. */
  updateStatus(jobId: string, from: JobStatus, update: StatusUpdate): Promise<AnalysisJob | null>;
  /** The only way a computed job enters `COMPLETE`. */
  setResult(jobId: string, from: JobStatus, payload: AnalysisResult): Promise<AnalysisJob | null>;
  /**
   * Most recently completed job for the fingerprint whose age is within `ttlMs`.
   * Jobs that are themselves cache copies never match.
   */
  findFreshByFingerprint(fingerprint: string, ttlMs: number): Promise<AnalysisJob | null>;
  listRecent(limit: number): Promise<AnalysisJob[]>;
}
