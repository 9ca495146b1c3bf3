#!/usr/bin/env node
import { fetch } from "undici";
import { logger } from "../logger";
import { AnalysisResult, JobStatus, JobStatusView, isTerminalStatus } from "../types/job";

export interface AnalysisApi {
  submit(question: string): Promise<{ analysis_id: string; status: JobStatus }>;
  status(jobId: string): Promise<JobStatusView>;
  result(jobId: string): Promise<AnalysisResult>;
}

export class ApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`API request failed (${status}): ${body}`);
    this.status = status;
    this.body = body;
    this.name = "ApiError";
  }
}

export function createApiClient(baseUrl: string, apiKey?: string): AnalysisApi {
  const base = baseUrl.replace(/\/$/, "");

  async function request<T>(path: string, init: { method: "GET" | "POST"; body?: string } = { method: "GET" }) {
    const response = await fetch(`${base}${path}`, {
      method: init.method,
      headers: {
        ...(apiKey ? { "x-api-key": apiKey } : {}),
        ...(init.body ? { "content-type": "application/json" } : {}),
      },
      body: init.body,
    });
    if (!response.ok) {
      throw new ApiError(response.status, await response.text());
    }
    return (await response.json()) as T;
  }

  return {
    submit: (question) =>
      request<{ analysis_id: string; status: JobStatus }>("/api/v1/analyze", { method: "POST", body: JSON.stringify({ research_question: question }) }),
    status: (jobId) => request<JobStatusView>(`/api/v1/analyze/${encodeURIComponent(jobId)}/status`),
    result: (jobId) => request<AnalysisResult>(`/api/v1/analyze/${encodeURIComponent(jobId)}`),
  };
}

interface WaitOptions {
  intervalMs: number;
  onProgress?: (view: JobStatusView) => void;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Polls until the job is terminal, reporting each change of status or progress once. */
export async function waitForCompletion(
  api: AnalysisApi,
  jobId: string,
  options: WaitOptions,
): Promise<JobStatusView> {
  const sleep = options.sleep ?? defaultSleep;
  let last: JobStatusView | null = null;
  for (;;) {
    const view = await api.status(jobId);
    if (!last || last.status !== view.status || last.progress !== view.progress) {
      options.onProgress?.(view);
    }
    last = view;
    if (isTerminalStatus(view.status)) {
      return view;
    }
    await sleep(options.intervalMs);
  }
}

export interface CliArgs {
  question: string;
  intervalMs: number;
}

export function parseArgs(argv: string[]): CliArgs {
  let intervalSeconds = 2;
  const words: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--interval") {
      const value = Number(argv[i + 1]);
      if (!Number.isFinite(value) || value <= 0) {
        throw new Error("--interval expects a positive number of seconds");
      }
      intervalSeconds = value;
      i += 1;
      continue;
    }
    words.push(arg);
  }
  const question = words.join(" ").trim();
  if (!question) {
    throw new Error('Usage: analyze "<research question>" [--interval seconds]');
  }
  return { question, intervalMs: intervalSeconds * 1000 };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const api = createApiClient(
    process.env.ANALYZE_API_BASE ?? "http://localhost:8080",
    process.env.ORCH_API_KEY,
  );

  const submitted = await api.submit(args.question);
  logger.info({ analysisId: submitted.analysis_id, status: submitted.status }, "Analysis submitted");

  const final = await waitForCompletion(api, submitted.analysis_id, {
    intervalMs: args.intervalMs,
    onProgress: (view) =>
      logger.info({ status: view.status, progress: view.progress, step: view.current_step }, "Progress"),
  });

  if (final.status === "ERROR") {
    logger.error({ analysisId: final.job_id, error: final.error_message }, "Analysis failed");
    process.exitCode = 1;
    return;
  }
  const result = await api.result(final.job_id);
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
}

if (require.main === module) {
  main().catch((err) => {
    logger.error({ err }, "Analysis request failed");
    process.exitCode = 1;
  });
}
