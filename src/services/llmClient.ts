import { fetch } from "undici";
import { config } from "../config";
import { logger } from "../logger";
import { recordToolError, startToolTimer } from "../metrics";
import { ProviderError, withRetry } from "../utils/retry";

export type ChatMessage = { role: "system" | "user" | "assistant"; content: string };

export interface ChatOptions {
  maxTokens?: number;
  temperature?: number;
  json?: boolean;
  signal?: AbortSignal;
}

export type ChatCompletionFn = (messages: ChatMessage[], opts?: ChatOptions) => Promise<string>;

export const chatCompletion: ChatCompletionFn = async (messages, opts = {}) => {
  const body = {
    model: config.llm.model,
    messages,
    max_tokens: opts.maxTokens ?? config.llm.maxTokens,
    temperature: opts.temperature ?? 0.3,
    ...(opts.json ? { response_format: { type: "json_object" } } : {}),
  };

  return withRetry(
    async () => {
      const stopTimer = startToolTimer("llm");
      try {
        const response = await fetch(`${config.llm.baseUrl}/chat/completions`, {
          method: "POST",
          headers: {
            "content-type": "application/json",
            ...(config.llm.apiKey ? { authorization: `Bearer ${config.llm.apiKey}` } : {}),
          },
          body: JSON.stringify(body),
          signal: opts.signal,
        });

        if (!response.ok) {
          const text = await response.text();
          logger.error({ status: response.status, text }, "LLM request failed");
          recordToolError("llm", "http");
          throw new ProviderError("llm", `LLM request failed (${response.status})`, response.status);
        }

        const data = (await response.json()) as {
          choices?: { message?: { content?: string | null } }[];
        };
        return data.choices?.[0]?.message?.content ?? "";
      } finally {
        stopTimer();
      }
    },
    {
      signal: opts.signal,
      onRetry: (log) => logger.warn(log, "Retrying LLM request"),
    },
  );
};
