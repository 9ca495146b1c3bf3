import { JobStatus } from "./types/job";

export class ValidationError extends Error {
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.details = details;
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error {
  readonly jobId: string;

  constructor(jobId: string) {
    super(`Analysis ${jobId} not found`);
    this.jobId = jobId;
    this.name = "NotFoundError";
  }
}

export class NotReadyError extends Error {
  readonly jobId: string;
  readonly status: JobStatus;

  constructor(jobId: string, status: JobStatus) {
    super(`Analysis ${jobId} is not complete (status ${status})`);
    this.jobId = jobId;
    this.status = status;
    this.name = "NotReadyError";
  }
}

export class StageTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(stage: string, timeoutMs: number) {
    super(`${stage} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
    this.name = "StageTimeoutError";
  }
}

export class StageFailure extends Error {
  readonly stage: string;

  constructor(stage: string, cause: unknown) {
    super(`${stage} stage failed: ${describeError(cause)}`, { cause });
    this.stage = stage;
    this.name = "StageFailure";
  }
}

export class StoreFailure extends Error {
  constructor(operation: string, cause: unknown) {
    super(`Job store ${operation} failed: ${describeError(cause)}`, { cause });
    this.name = "StoreFailure";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
