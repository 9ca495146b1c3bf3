import { z } from "zod";
import { NotFoundError, StageFailure, ValidationError, describeError } from "../errors";
import { logger } from "../logger";
import { jobDurationHistogram, jobStatusCounter } from "../metrics";
import { JobStore } from "../repositories/jobStore";
import { AnalysisJob, AnalysisResult, JobStatus, StatusUpdate, isTerminalStatus } from "../types/job";
import { CacheIndex, fingerprintQuestion } from "./cacheIndex";
import { ResearchStages } from "./researchStages";
import { Stage, StageContext, runStage } from "./stageRunner";
import { TaskQueue } from "./taskQueue";

export const MIN_QUESTION_LENGTH = 10;
export const MAX_QUESTION_LENGTH = 500;

// Lengths count code points, not UTF-16 units.
const characterCount = (text: string) => [...text.trim()].length;

const questionSchema = z
  .string({ required_error: "research_question is required" })
  .refine(
    (text) => characterCount(text) >= MIN_QUESTION_LENGTH,
    `research_question must be at least ${MIN_QUESTION_LENGTH} characters`,
  )
  .refine(
    (text) => characterCount(text) <= MAX_QUESTION_LENGTH,
    `research_question must be at most ${MAX_QUESTION_LENGTH} characters`,
  );

/** Returns the question as submitted; surrounding whitespace does not count toward its length. */
export function validateQuestion(question: unknown): string {
  const parsed = questionSchema.safeParse(question);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue?.message ?? "Invalid research_question", {
      field: "research_question",
      issues: parsed.error.issues.map((entry) => entry.message),
    });
  }
  return parsed.data;
}

type ActiveStatus = Extract<JobStatus, "PROCESSING" | "SCRAPING" | "SYNTHESIZING">;

interface PipelineStep {
  runsIn: ActiveStatus;
  stage: Stage;
  next: { status: Exclude<ActiveStatus, "PROCESSING"> | "COMPLETE"; progress: number };
}

const CLAIM_PROGRESS = 10;
const CANCELLED_MESSAGE = "Cancelled by request";

export interface OrchestratorOptions {
  store: JobStore;
  cache: CacheIndex;
  stages: ResearchStages;
  queue: TaskQueue;
  stageTimeoutMs: number;
  now?: () => Date;
}

/**
 * Owns the job lifecycle. It is the only writer of job state: stages hand back
 * contexts and the orchestrator persists each transition before the next stage
 * starts.
 */
export class JobOrchestrator {
  private readonly store: JobStore;
  private readonly cache: CacheIndex;
  private readonly queue: TaskQueue;
  private readonly stageTimeoutMs: number;
  private readonly now: () => Date;
  private readonly pipeline: PipelineStep[];
  private readonly activeRuns = new Set<string>();
  private readonly cancelRequests = new Set<string>();

  constructor(options: OrchestratorOptions) {
    this.store = options.store;
    this.cache = options.cache;
    this.queue = options.queue;
    this.stageTimeoutMs = options.stageTimeoutMs;
    this.now = options.now ?? (() => new Date());
    this.pipeline = [
      { runsIn: "PROCESSING", stage: options.stages.collect, next: { status: "SCRAPING", progress: 30 } },
      { runsIn: "SCRAPING", stage: options.stages.process, next: { status: "SYNTHESIZING", progress: 60 } },
      { runsIn: "SYNTHESIZING", stage: options.stages.visualize, next: { status: "COMPLETE", progress: 100 } },
    ];
  }

  async submit(question: unknown): Promise<AnalysisJob> {
    const text = validateQuestion(question);
    const fingerprint = fingerprintQuestion(text);

    const cached = await this.cache.lookup(fingerprint);
    if (cached?.result_payload) {
      const completed = await this.store.createCompleted({
        question: text,
        fingerprint,
        cachedFrom: cached.id,
        payload: cached.result_payload,
      });
      jobStatusCounter.labels("cached").inc();
      logger.info({ jobId: completed.id, cachedFrom: cached.id }, "Served analysis from cache");
      return completed;
    }

    const job = await this.store.create({ question: text, fingerprint });
    this.schedule(job.id);
    logger.info({ jobId: job.id }, "Queued analysis job");
    return job;
  }

  /** Hands the job to the task queue. Returns false if it is already scheduled. */
  schedule(jobId: string): boolean {
    return this.queue.enqueue(jobId, () => this.run(jobId));
  }

  /**
   * Runs the pipeline for one job. A second call while a run is active, or a
   * call for a job that is no longer QUEUED, does nothing.
   */
  async run(jobId: string): Promise<void> {
    if (this.activeRuns.has(jobId)) {
      logger.debug({ jobId }, "Run already active");
      return;
    }
    this.activeRuns.add(jobId);
    try {
      await this.execute(jobId);
    } finally {
      this.activeRuns.delete(jobId);
      this.cancelRequests.delete(jobId);
    }
  }

  /**
   * Cancels a job at the next stage boundary. Jobs still waiting in the queue
   * fail straight away; terminal jobs are returned unchanged.
   */
  async cancel(jobId: string): Promise<AnalysisJob> {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new NotFoundError(jobId);
    }
    if (isTerminalStatus(job.status)) {
      return job;
    }
    if (job.status === "QUEUED" && !this.activeRuns.has(jobId)) {
      const cancelled = await this.store.updateStatus(jobId, "QUEUED", {
        status: "ERROR",
        progress: job.progress,
        currentStep: null,
        errorMessage: "Cancelled before start",
      });
      if (cancelled) {
        jobStatusCounter.labels("cancelled").inc();
        logger.info({ jobId }, "Cancelled queued job");
        return cancelled;
      }
    }
    if (this.activeRuns.has(jobId)) {
      this.cancelRequests.add(jobId);
      logger.info({ jobId }, "Cancellation requested");
    }
    return (await this.store.get(jobId)) ?? job;
  }

  private async execute(jobId: string) {
    const first = this.pipeline[0];
    const claimed = await this.store.updateStatus(jobId, "QUEUED", {
      status: first.runsIn,
      progress: CLAIM_PROGRESS,
      currentStep: first.stage.label,
    });
    if (!claimed) {
      logger.info({ jobId }, "Job not claimable, skipping run");
      return;
    }

    const stopJobTimer = jobDurationHistogram.startTimer();
    jobStatusCounter.labels("started").inc();
    logger.info({ jobId }, "Starting analysis run");

    let context: StageContext = { question: claimed.input_question.trim() };
    let progress = claimed.progress;

    for (const [index, step] of this.pipeline.entries()) {
      if (this.cancelRequests.has(jobId)) {
        await this.fail(jobId, step.runsIn, progress, CANCELLED_MESSAGE);
        jobStatusCounter.labels("cancelled").inc();
        stopJobTimer({ status: "cancelled" });
        return;
      }

      try {
        context = await runStage(step.stage, context, this.stageTimeoutMs);
      } catch (error) {
        const failure = error instanceof StageFailure ? error : new StageFailure(step.stage.name, error);
        logger.warn({ jobId, stage: step.stage.name, err: failure }, "Stage failed");
        await this.fail(jobId, step.runsIn, progress, failure.message);
        jobStatusCounter.labels("error").inc();
        stopJobTimer({ status: "error" });
        return;
      }

      const following = this.pipeline[index + 1];
      if (following && step.next.status !== "COMPLETE") {
        const advance: StatusUpdate = {
          status: step.next.status,
          progress: step.next.progress,
          currentStep: following.stage.label,
        };
        const updated = await this.recordOrFail(jobId, step.runsIn, progress, () =>
          this.store.updateStatus(jobId, step.runsIn, advance),
        );
        if (!updated) {
          logger.warn({ jobId, expected: step.runsIn }, "Job changed outside its run, stopping");
          return;
        }
        progress = updated.progress;
        logger.info({ jobId, status: updated.status, progress }, "Stage completed");
        continue;
      }

      const result = this.assembleResult(context);
      if (!result) {
        await this.fail(jobId, step.runsIn, progress, `${step.stage.name} stage failed: stage output incomplete`);
        jobStatusCounter.labels("error").inc();
        stopJobTimer({ status: "error" });
        return;
      }
      const completed = await this.recordOrFail(jobId, step.runsIn, progress, () =>
        this.store.setResult(jobId, step.runsIn, result),
      );
      if (!completed) {
        logger.warn({ jobId, expected: step.runsIn }, "Job changed outside its run, result discarded");
        return;
      }
      jobStatusCounter.labels("completed").inc();
      stopJobTimer({ status: "completed" });
      logger.info({ jobId }, "Analysis completed");
    }
  }

  /**
   * Runs a bookkeeping write for an active job. If the store throws, the job is
   * moved to ERROR on a best-effort basis before the error is rethrown, so a
   * run never leaves its job in an active status.
   */
  private async recordOrFail<T>(
    jobId: string,
    from: ActiveStatus,
    progress: number,
    write: () => Promise<T>,
  ): Promise<T> {
    try {
      return await write();
    } catch (error) {
      logger.error({ jobId, err: error }, "Job store write failed during run");
      jobStatusCounter.labels("error").inc();
      try {
        await this.fail(jobId, from, progress, describeError(error));
      } catch (failError) {
        logger.error({ jobId, err: failError }, "Could not record job failure");
      }
      throw error;
    }
  }

  private async fail(jobId: string, from: ActiveStatus, progress: number, message: string) {
    const failed = await this.store.updateStatus(jobId, from, {
      status: "ERROR",
      progress,
      currentStep: null,
      errorMessage: message,
    });
    if (!failed) {
      logger.warn({ jobId, expected: from }, "Could not record job failure, job changed outside its run");
    }
  }

  private assembleResult(context: StageContext): AnalysisResult | null {
    if (!context.webResults || !context.llmResponse || !context.visualization) {
      return null;
    }
    return {
      research_question: context.question,
      completed_at: this.now().toISOString(),
      web_results: context.webResults,
      llm_response: context.llmResponse,
      visualization: context.visualization,
    };
  }
}
