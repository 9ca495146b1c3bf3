import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.string().optional().default("development"),
  PORT: z.coerce.number().optional().default(8080),
  ORCH_API_KEY: z.string().optional(),
  JOB_STORE: z.enum(["postgres", "memory"]).optional().default("postgres"),
  PGHOST: z.string().optional().default("localhost"),
  PGPORT: z.coerce.number().default(5432),
  POSTGRES_USER: z.string().optional().default("postgres"),
  POSTGRES_PASSWORD: z.string().optional(),
  POSTGRES_DB: z.string().optional().default("search_insight"),
  CACHE_TTL_HOURS: z.coerce.number().min(0).optional().default(24),
  MAX_CONCURRENT_JOBS: z.coerce.number().int().min(1).optional().default(4),
  STAGE_TIMEOUT_SECONDS: z.coerce.number().positive().optional().default(120),
  LLM_BASE_URL: z.string().optional().default("https://api.openai.com/v1"),
  LLM_API_KEY: z.string().optional(),
  LLM_MODEL_NAME: z.string().optional().default("gpt-4o"),
  MAX_LLM_TOKENS: z.coerce.number().optional().default(1000),
  SERP_API_URL: z.string().optional().default("https://api.brightdata.com/request"),
  SERP_API_KEY: z.string().optional(),
  SERP_ZONE: z.string().optional().default("serp"),
});

const env = envSchema.parse(process.env);

export const config = {
  env: env.NODE_ENV,
  port: env.PORT,
  apiKey: env.ORCH_API_KEY,
  store: env.JOB_STORE,
  database: {
    host: env.PGHOST,
    port: env.PGPORT,
    user: env.POSTGRES_USER,
    password: env.POSTGRES_PASSWORD,
    database: env.POSTGRES_DB,
  },
  cache: {
    ttlHours: env.CACHE_TTL_HOURS,
    ttlMs: env.CACHE_TTL_HOURS * 60 * 60 * 1000,
  },
  worker: {
    maxConcurrent: env.MAX_CONCURRENT_JOBS,
    stageTimeoutMs: env.STAGE_TIMEOUT_SECONDS * 1000,
  },
  llm: {
    baseUrl: env.LLM_BASE_URL.replace(/\/$/, ""),
    apiKey: env.LLM_API_KEY,
    model: env.LLM_MODEL_NAME,
    maxTokens: env.MAX_LLM_TOKENS,
  },
  serp: {
    url: env.SERP_API_URL,
    apiKey: env.SERP_API_KEY,
    zone: env.SERP_ZONE,
  },
};

export type AppConfig = typeof config;
