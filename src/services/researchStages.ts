import { z } from "zod";
import { describeError } from "../errors";
import { logger } from "../logger";
import { fillPrompt, prompts } from "../prompts";
import { BrandScore, LlmResponse, VisualizationData, WebAnalysis, WebSource } from "../types/job";
import { ChatCompletionFn } from "./llmClient";
import { SerpSearchFn } from "./serpClient";
import { Stage, StageContext } from "./stageRunner";

export interface ResearchClients {
  chat: ChatCompletionFn;
  search: SerpSearchFn;
  now?: () => Date;
}

export interface ResearchStages {
  collect: Stage;
  process: Stage;
  visualize: Stage;
}

export const FALLBACK_SOURCE = "Fallback Analysis";
const WEB_SOURCE = "SERP Web Analysis";
const MAX_VISUALIZER_INPUT = 10000;
const MAX_BRANDS = 5;

const CHART_DEFAULTS = {
  chart_type: "bar_chart_brand_visibility",
  title: "Top 5 Brands by LLM Search Visibility",
  x_axis_label: "Brand Name",
  y_axis_label: "Visibility Score (1-100)",
} as const;

const entitiesSchema = z.union([
  z.array(z.unknown()),
  z.object({ entities: z.array(z.unknown()) }).transform((value) => value.entities),
]);

const visualizationSchema = z.object({
  top_5_brands: z.array(z.string()).min(1),
  brand_scores: z
    .array(
      z.object({
        brand_name: z.string().min(1),
        visibility_score: z.coerce.number().transform(clampScore),
        rank: z.coerce.number().int().min(1),
        mentions: z.coerce.number().int().min(0),
      }),
    )
    .min(1),
  methodology_explanation: z.string(),
});

function clampScore(value: number) {
  if (!Number.isFinite(value)) {
    return 1;
  }
  return Math.min(100, Math.max(1, Math.round(value)));
}

/**
 * Confidence in tenths: a long analysis and one that talks about brands or
 * companies both count for more.
 */
export function scoreConfidence(content: string) {
  let tenths = 7;
  if (content.length > 800) {
    tenths += 2;
  }
  const lower = content.toLowerCase();
  if (lower.includes("brand") || lower.includes("company")) {
    tenths += 1;
  }
  return Math.min(tenths, 10) / 10;
}

export function parseEntities(raw: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.warn({ error }, "Entity extraction output was not JSON");
    return [];
  }
  const result = entitiesSchema.safeParse(parsed);
  if (!result.success) {
    return [];
  }
  const names = result.data
    .filter((entry): entry is string => typeof entry === "string")
    .map((entry) => entry.trim())
    .filter(Boolean);
  return [...new Set(names)];
}

export function placeholderVisualization(label: string, explanation: string): VisualizationData {
  return {
    ...CHART_DEFAULTS,
    top_5_brands: [label],
    brand_scores: [{ brand_name: label, visibility_score: 1, rank: 1, mentions: 0 }],
    methodology_explanation: explanation,
  };
}

export function visualizationFromBrands(brands: string[]): VisualizationData {
  const top = brands.slice(0, MAX_BRANDS);
  if (!top.length) {
    return placeholderVisualization(
      "No brands identified",
      "Neither web analysis nor the LLM answer identified specific brands for this query.",
    );
  }
  const scores: BrandScore[] = top.map((brand, index) => ({
    brand_name: brand,
    visibility_score: Math.max(1, 100 - index * 20),
    rank: index + 1,
    mentions: 1,
  }));
  return {
    ...CHART_DEFAULTS,
    top_5_brands: top,
    brand_scores: scores,
    methodology_explanation:
      "Web analysis failed, so visibility scores are estimated from the order in which the LLM answer ranked each brand.",
  };
}

export function buildResearchStages(clients: ResearchClients): ResearchStages {
  const now = clients.now ?? (() => new Date());

  async function analyzeWeb(question: string, signal: AbortSignal): Promise<WebAnalysis> {
    let sources: WebSource[];
    try {
      sources = await clients.search(question, { signal });
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      logger.warn({ error }, "Web search failed, continuing without web results");
      return {
        source: FALLBACK_SOURCE,
        content:
          `Unable to perform web analysis: ${describeError(error)}\n\n` +
          "This analysis relies on the LLM answer only, without real-time web search data.",
        timestamp: now().toISOString(),
        confidence_score: 0.1,
        sources: [],
      };
    }

    const listing = sources
      .map((source, idx) => `${idx + 1}. ${source.title}\nURL: ${source.url}\n${source.snippet ?? ""}`.trim())
      .join("\n---\n");
    const content = await clients.chat(
      [
        { role: "system", content: "You are an expert research analyst. Provide clear, structured analysis." },
        { role: "user", content: fillPrompt(prompts.webAnalyst, { QUESTION: question, RESULTS: listing }) },
      ],
      { signal },
    );
    return {
      source: WEB_SOURCE,
      content,
      timestamp: now().toISOString(),
      confidence_score: scoreConfidence(content),
      sources,
    };
  }

  async function askLlm(question: string, signal: AbortSignal): Promise<LlmResponse> {
    const responseText = await clients.chat(
      [
        { role: "system", content: prompts.answer },
        { role: "user", content: question },
      ],
      { signal },
    );
    const entitiesRaw = await clients.chat(
      [
        { role: "system", content: "You extract entity names from text. Respond with JSON only." },
        { role: "user", content: fillPrompt(prompts.entityExtractor, { TEXT: responseText }) },
      ],
      { json: true, temperature: 0, signal },
    );
    return { response_text: responseText, identified_brands: parseEntities(entitiesRaw) };
  }

  const collectStage: Stage = {
    name: "Collect",
    label: "Collecting web and LLM findings",
    async run(context, signal) {
      // Either branch failing aborts the other, as does the harness signal.
      const branches = new AbortController();
      const forward = () => branches.abort(signal.reason);
      if (signal.aborted) {
        forward();
      } else {
        signal.addEventListener("abort", forward, { once: true });
      }
      const abortSiblingOnFailure = <T>(work: Promise<T>) =>
        work.catch((error: unknown) => {
          branches.abort(error);
          throw error;
        });

      try {
        const [webResults, llmResponse] = await Promise.all([
          abortSiblingOnFailure(analyzeWeb(context.question, branches.signal)),
          abortSiblingOnFailure(askLlm(context.question, branches.signal)),
        ]);
        return { ...context, webResults, llmResponse };
      } finally {
        signal.removeEventListener("abort", forward);
      }
    },
  };

  // Placeholder slot for cleaning and enrichment; findings pass through unchanged.
  const processStage: Stage = {
    name: "Process",
    label: "Processing collected findings",
    async run(context) {
      return { ...context };
    },
  };

  const visualizeStage: Stage = {
    name: "Visualize",
    label: "Synthesizing report and visualization",
    async run(context: StageContext, signal) {
      if (!context.webResults || !context.llmResponse) {
        throw new Error("collected findings missing from context");
      }
      if (context.webResults.source === FALLBACK_SOURCE) {
        return { ...context, visualization: visualizationFromBrands(context.llmResponse.identified_brands) };
      }
      try {
        const raw = await clients.chat(
          [
            {
              role: "system",
              content:
                "You are a precise data extraction engine. Your only output is a single valid JSON object in the requested format.",
            },
            {
              role: "user",
              content: fillPrompt(prompts.visualizer, {
                TEXT: context.webResults.content.slice(0, MAX_VISUALIZER_INPUT),
              }),
            },
          ],
          { json: true, temperature: 0, signal },
        );
        const parsed = visualizationSchema.parse(JSON.parse(raw));
        return {
          ...context,
          visualization: {
            ...CHART_DEFAULTS,
            ...parsed,
            top_5_brands: parsed.top_5_brands.slice(0, MAX_BRANDS),
            brand_scores: parsed.brand_scores.slice(0, MAX_BRANDS),
          },
        };
      } catch (error) {
        if (signal.aborted) {
          throw error;
        }
        logger.warn({ error }, "Visualization extraction failed, using placeholder");
        return {
          ...context,
          visualization: placeholderVisualization(
            "Analysis error",
            `Data extraction failed due to an error: ${describeError(error)}`,
          ),
        };
      }
    },
  };

  return { collect: collectStage, process: processStage, visualize: visualizeStage };
}
