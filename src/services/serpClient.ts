import { fetch } from "undici";
import { z } from "zod";
import { config } from "../config";
import { logger } from "../logger";
import { recordToolError, startToolTimer } from "../metrics";
import { WebSource } from "../types/job";
import { ProviderError, withRetry } from "../utils/retry";

export type SerpSearchFn = (query: string, opts?: { signal?: AbortSignal }) => Promise<WebSource[]>;

const serpResponseSchema = z.object({
  organic: z.array(
    z
      .object({
        title: z.string().optional(),
        link: z.string().optional(),
        url: z.string().optional(),
        description: z.string().optional(),
        snippet: z.string().optional(),
      })
      .passthrough(),
  ),
});

export function parseOrganicResults(data: unknown, limit = 8): WebSource[] {
  const parsed = serpResponseSchema.safeParse(data);
  if (!parsed.success) {
    return [];
  }
  const results: WebSource[] = [];
  for (const entry of parsed.data.organic) {
    const url = entry.link ?? entry.url;
    if (!url || !entry.title) {
      continue;
    }
    const snippet = entry.description ?? entry.snippet;
    results.push({ title: entry.title, url, ...(snippet ? { snippet } : {}) });
    if (results.length >= limit) {
      break;
    }
  }
  return results;
}

export const serpSearch: SerpSearchFn = async (query, opts = {}) => {
  if (!config.serp.apiKey) {
    throw new ProviderError("serp", "SERP_API_KEY is not configured");
  }
  const searchUrl = `https://www.google.com/search?q=${encodeURIComponent(query)}&brd_json=1`;

  return withRetry(
    async () => {
      const stopTimer = startToolTimer("serp");
      try {
        const response = await fetch(config.serp.url, {
          method: "POST",
          headers: {
            "content-type": "application/json",
            authorization: `Bearer ${config.serp.apiKey}`,
          },
          body: JSON.stringify({ zone: config.serp.zone, url: searchUrl, format: "raw" }),
          signal: opts.signal,
        });

        if (!response.ok) {
          const text = await response.text();
          logger.error({ status: response.status, text }, "SERP request failed");
          recordToolError("serp", "http");
          throw new ProviderError("serp", `SERP request failed (${response.status})`, response.status);
        }

        const results = parseOrganicResults(await response.json());
        if (!results.length) {
          recordToolError("serp", "result");
          throw new ProviderError("serp", "SERP API did not return organic results");
        }
        return results;
      } finally {
        stopTimer();
      }
    },
    {
      signal: opts.signal,
      onRetry: (log) => logger.warn(log, "Retrying SERP request"),
    },
  );
};
