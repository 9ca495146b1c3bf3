import { NotFoundError, NotReadyError } from "../errors";
import { JobStore } from "../repositories/jobStore";
import { AnalysisJob, AnalysisResult, JobListItem, JobStatusView } from "../types/job";

export function toStatusView(job: AnalysisJob): JobStatusView {
  return {
    job_id: job.id,
    status: job.status,
    progress: job.progress,
    current_step: job.current_step,
    error_message: job.error_message,
  };
}

export function toListItem(job: AnalysisJob): JobListItem {
  return {
    job_id: job.id,
    question: job.input_question,
    status: job.status,
    created_at: job.created_at,
    completed_at: job.completed_at,
    cached: job.cached_from !== null,
  };
}

/**
 * Read-only view over the job store. Never schedules or computes anything.
 * A failed job has no result: `resultOf` reports it as not ready, and the
 * failure itself is visible through `statusOf`.
 */
export class JobFacade {
  constructor(private readonly store: JobStore) {}

  async statusOf(jobId: string): Promise<JobStatusView> {
    return toStatusView(await this.require(jobId));
  }

  async resultOf(jobId: string): Promise<AnalysisResult> {
    const job = await this.require(jobId);
    if (job.status !== "COMPLETE" || !job.result_payload) {
      throw new NotReadyError(job.id, job.status);
    }
    return job.result_payload;
  }

  async listRecent(limit: number): Promise<JobListItem[]> {
    const jobs = await this.store.listRecent(limit);
    return jobs.map(toListItem);
  }

  private async require(jobId: string) {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new NotFoundError(jobId);
    }
    return job;
  }
}
