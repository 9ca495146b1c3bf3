import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export const metricsRegistry = new Registry();
collectDefaultMetrics({ register: metricsRegistry });

export const jobStatusCounter = new Counter({
  name: "analysis_jobs_total",
  help: "Analysis jobs by lifecycle outcome",
  labelNames: ["status"],
  registers: [metricsRegistry],
});

export const jobDurationHistogram = new Histogram({
  name: "analysis_job_duration_seconds",
  help: "Time from claim to terminal state in seconds",
  buckets: [5, 15, 30, 60, 120, 300, 600],
  labelNames: ["status"],
  registers: [metricsRegistry],
});

export const stageDurationHistogram = new Histogram({
  name: "analysis_stage_duration_seconds",
  help: "Stage execution time in seconds",
  buckets: [0.5, 1, 2, 5, 10, 30, 60, 120],
  labelNames: ["stage"],
  registers: [metricsRegistry],
});

export const stageFailureCounter = new Counter({
  name: "analysis_stage_failures_total",
  help: "Stage failures, including timeouts",
  labelNames: ["stage"],
  registers: [metricsRegistry],
});

export const cacheLookupCounter = new Counter({
  name: "analysis_cache_lookups_total",
  help: "Result cache lookups by outcome",
  labelNames: ["result"],
  registers: [metricsRegistry],
});

export const toolLatencyHistogram = new Histogram({
  name: "analysis_tool_latency_seconds",
  help: "Latency for external provider calls",
  buckets: [0.5, 1, 2, 5, 10, 20, 30],
  labelNames: ["tool"],
  registers: [metricsRegistry],
});

export const toolErrorsCounter = new Counter({
  name: "analysis_tool_errors_total",
  help: "External provider failures by tool and stage",
  labelNames: ["tool", "stage"],
  registers: [metricsRegistry],
});

export function startToolTimer(tool: string) {
  return toolLatencyHistogram.startTimer({ tool });
}

export function recordToolError(tool: string, stage: string) {
  toolErrorsCounter.labels(tool, stage).inc();
}

export function recordCacheLookup(result: "hit" | "miss") {
  cacheLookupCounter.labels(result).inc();
}
