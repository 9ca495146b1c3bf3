export const JOB_STATUSES = [
  "QUEUED",
  "PROCESSING",
  "SCRAPING",
  "SYNTHESIZING",
  "COMPLETE",
  "ERROR",
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type TerminalStatus = Extract<JobStatus, "COMPLETE" | "ERROR">;

export function isTerminalStatus(status: JobStatus): status is TerminalStatus {
  return status === "COMPLETE" || status === "ERROR";
}

export interface AnalysisJob {
  id: string;
  request_fingerprint: string;
  input_question: string;
  status: JobStatus;
  progress: number;
  current_step: string | null;
  error_message: string | null;
  result_payload: AnalysisResult | null;
  cached_from: string | null;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
}

export interface StatusUpdate {
  status: Exclude<JobStatus, "QUEUED" | "COMPLETE">;
  progress: number;
  currentStep: string | null;
  errorMessage?: string;
}

export interface WebSource {
  title: string;
  url: string;
  snippet?: string;
}

export interface WebAnalysis {
  source: string;
  content: string;
  timestamp: string;
  confidence_score: number;
  sources: WebSource[];
}

export interface LlmResponse {
  response_text: string;
  identified_brands: string[];
}

export interface BrandScore {
  brand_name: string;
  visibility_score: number;
  rank: number;
  mentions: number;
}

export interface VisualizationData {
  chart_type: string;
  title: string;
  x_axis_label: string;
  y_axis_label: string;
  top_5_brands: string[];
  brand_scores: BrandScore[];
  methodology_explanation: string;
}

export interface AnalysisResult {
  research_question: string;
  completed_at: string;
  web_results: WebAnalysis;
  llm_response: LlmResponse;
  visualization: VisualizationData;
}

export interface JobStatusView {
  job_id: string;
  status: JobStatus;
  progress: number;
  current_step: string | null;
  error_message: string | null;
}

export interface JobListItem {
  job_id: string;
  question: string;
  status: JobStatus;
  created_at: string;
  completed_at: string | null;
  cached: boolean;
}
