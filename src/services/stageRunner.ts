import { StageFailure, StageTimeoutError } from "../errors";
import { stageDurationHistogram, stageFailureCounter } from "../metrics";
import { LlmResponse, VisualizationData, WebAnalysis } from "../types/job";

/**
 * Accumulated state handed from stage to stage. Starts with the question and
 * picks up each stage's output on the way.
 */
export interface StageContext {
  question: string;
  webResults?: WebAnalysis;
  llmResponse?: LlmResponse;
  visualization?: VisualizationData;
}

/**
 * A pipeline stage. It knows nothing about jobs or persistence: it maps a
 * context to a new context or rejects. `signal` fires when the harness gives
 * up on the stage.
 */
export interface Stage {
  name: string;
  label: string;
  run(context: StageContext, signal: AbortSignal): Promise<StageContext>;
}

export async function runStage(
  stage: Stage,
  context: StageContext,
  timeoutMs: number,
): Promise<StageContext> {
  const controller = new AbortController();
  const stopTimer = stageDurationHistogram.startTimer({ stage: stage.name });
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new StageTimeoutError(stage.name, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([stage.run(context, controller.signal), timeout]);
  } catch (error) {
    stageFailureCounter.labels(stage.name).inc();
    throw new StageFailure(stage.name, error);
  } finally {
    clearTimeout(timer);
    stopTimer();
  }
}
