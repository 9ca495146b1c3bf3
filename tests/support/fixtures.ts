import type { ResearchStages } from "../../src/services/researchStages";
import type { StageContext } from "../../src/services/stageRunner";
import { LlmResponse, VisualizationData, WebAnalysis } from "../../src/types/job";

export const QUESTION = "Which project management tools do startups recommend?";

export const sampleWeb: WebAnalysis = {
  source: "SERP Web Analysis",
  content: "Startups most often mention Acme Boards and Tasky.",
  timestamp: "2026-01-01T00:00:00.000Z",
  confidence_score: 0.8,
  sources: [{ title: "Tool roundup", url: "https://example.com/roundup" }],
};

export const sampleLlm: LlmResponse = {
  response_text: "Acme Boards and Tasky are popular picks.",
  identified_brands: ["Acme Boards", "Tasky"],
};

export const sampleVisualization: VisualizationData = {
  chart_type: "bar_chart_brand_visibility",
  title: "Top 5 Brands by LLM Search Visibility",
  x_axis_label: "Brand Name",
  y_axis_label: "Visibility Score (1-100)",
  top_5_brands: ["Acme Boards", "Tasky"],
  brand_scores: [
    { brand_name: "Acme Boards", visibility_score: 90, rank: 1, mentions: 3 },
    { brand_name: "Tasky", visibility_score: 70, rank: 2, mentions: 2 },
  ],
  methodology_explanation: "Counted mentions across sources.",
};

/** Stages that succeed with canned findings unless a test overrides them. */
export function fakeStages() {
  const collect = jest.fn(
    async (context: StageContext): Promise<StageContext> => ({
      ...context,
      webResults: sampleWeb,
      llmResponse: sampleLlm,
    }),
  );
  const process = jest.fn(async (context: StageContext): Promise<StageContext> => ({ ...context }));
  const visualize = jest.fn(
    async (context: StageContext): Promise<StageContext> => ({
      ...context,
      visualization: sampleVisualization,
    }),
  );
  const stages: ResearchStages = {
    collect: { name: "Collect", label: "Collecting findings", run: collect },
    process: { name: "Process", label: "Processing findings", run: process },
    visualize: { name: "Visualize", label: "Building visualization", run: visualize },
  };
  return { stages, collect, process, visualize };
}

export function manualClock(start = "2026-03-01T12:00:00.000Z") {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advance(ms: number) {
      current += ms;
    },
  };
}
