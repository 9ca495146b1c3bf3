import { QueryResult, QueryResultRow } from "pg";
import { StoreFailure } from "../errors";
import { AnalysisJob, AnalysisResult, JobStatus, StatusUpdate } from "../types/job";
import { CreateCompletedInput, CreateJobInput, JobStore } from "./jobStore";

export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
}

interface JobRow {
  id: string;
  request_fingerprint: string;
  input_question: string;
  status: JobStatus;
  progress: number;
  current_step: string | null;
  error_message: string | null;
  result_payload: AnalysisResult | null;
  cached_from: string | null;
  created_at: Date;
  updated_at: Date;
  completed_at: Date | null;
}

function toJob(row: JobRow): AnalysisJob {
  return {
    ...row,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
    completed_at: row.completed_at ? row.completed_at.toISOString() : null,
  };
}

export class PgJobStore implements JobStore {
  constructor(
    private readonly db: Queryable,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async create(input: CreateJobInput): Promise<AnalysisJob> {
    const timestamp = this.now();
    const { rows } = await this.exec<JobRow>(
      "create",
      `INSERT INTO analysis_jobs (input_question, request_fingerprint, cached_from, status, progress, created_at, updated_at)
       VALUES ($1, $2, $3, 'QUEUED', 0, $4, $4)
       RETURNING *`,
      [input.question, input.fingerprint, input.cachedFrom ?? null, timestamp],
    );
    return this.inserted("create", rows);
  }

  async createCompleted(input: CreateCompletedInput): Promise<AnalysisJob> {
    const timestamp = this.now();
    const { rows } = await this.exec<JobRow>(
      "createCompleted",
      `INSERT INTO analysis_jobs
         (input_question, request_fingerprint, cached_from, status, progress, result_payload,
          created_at, updated_at, completed_at)
       VALUES ($1, $2, $3, 'COMPLETE', 100, $4, $5, $5, $5)
       RETURNING *`,
      [input.question, input.fingerprint, input.cachedFrom, input.payload, timestamp],
    );
    return this.inserted("createCompleted", rows);
  }

  async get(jobId: string): Promise<AnalysisJob | null> {
    const { rows } = await this.exec<JobRow>(
      "get",
      "SELECT * FROM analysis_jobs WHERE id = $1",
      [jobId],
    );
    return rows[0] ? toJob(rows[0]) : null;
  }

  async updateStatus(
    jobId: string,
    from: JobStatus,
    update: StatusUpdate,
  ): Promise<AnalysisJob | null> {
    const timestamp = this.now();
    const { rows } = await this.exec<JobRow>(
      "updateStatus",
      `UPDATE analysis_jobs
          SET status = $3,
              progress = GREATEST(progress, $4),
              current_step = $5,
              error_message = $6,
              completed_at = CASE WHEN $3::text = 'ERROR' THEN $7 ELSE completed_at END,
              updated_at = $7
        WHERE id = $1 AND status = $2
        RETURNING *`,
      [
        jobId,
        from,
        update.status,
        update.progress,
        update.currentStep,
        update.status === "ERROR" ? update.errorMessage ?? "Unknown error" : null,
        timestamp,
      ],
    );
    return rows[0] ? toJob(rows[0]) : null;
  }

  async setResult(
    jobId: string,
    from: JobStatus,
    payload: AnalysisResult,
  ): Promise<AnalysisJob | null> {
    const timestamp = this.now();
    const { rows } = await this.exec<JobRow>(
      "setResult",
      `UPDATE analysis_jobs
          SET status = 'COMPLETE',
              progress = 100,
              current_step = NULL,
              error_message = NULL,
              result_payload = $3,
              completed_at = $4,
              updated_at = $4
        WHERE id = $1 AND status = $2
        RETURNING *`,
      [jobId, from, payload, timestamp],
    );
    return rows[0] ? toJob(rows[0]) : null;
  }

  async findFreshByFingerprint(fingerprint: string, ttlMs: number): Promise<AnalysisJob | null> {
    const cutoff = new Date(this.now().getTime() - ttlMs);
    const { rows } = await this.exec<JobRow>(
      "findFreshByFingerprint",
      `SELECT * FROM analysis_jobs
        WHERE request_fingerprint = $1
          AND status = 'COMPLETE'
          AND cached_from IS NULL
          AND completed_at >= $2
        ORDER BY completed_at DESC
        LIMIT 1`,
      [fingerprint, cutoff],
    );
    return rows[0] ? toJob(rows[0]) : null;
  }

  async listRecent(limit: number): Promise<AnalysisJob[]> {
    const { rows } = await this.exec<JobRow>(
      "listRecent",
      `SELECT * FROM analysis_jobs
        ORDER BY created_at DESC
        LIMIT $1`,
      [limit],
    );
    return rows.map(toJob);
  }

  private inserted(operation: string, rows: JobRow[]) {
    const [row] = rows;
    if (!row) {
      throw new StoreFailure(operation, new Error("insert returned no row"));
    }
    return toJob(row);
  }

  private async exec<R extends QueryResultRow>(
    operation: string,
    text: string,
    values: unknown[],
  ): Promise<QueryResult<R>> {
    try {
      return await this.db.query<R>(text, values);
    } catch (error) {
      throw new StoreFailure(operation, error);
    }
  }
}
