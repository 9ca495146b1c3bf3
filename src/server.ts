import Fastify, { FastifyInstance } from "fastify";
import sensible from "@fastify/sensible";
import { z, ZodError } from "zod";
import { NotFoundError, NotReadyError, ValidationError } from "./errors";
import { metricsRegistry } from "./metrics";
import { JobFacade, toStatusView } from "./services/jobFacade";
import { JobOrchestrator } from "./services/orchestrator";

export interface ServerDeps {
  orchestrator: JobOrchestrator;
  facade: JobFacade;
  apiKey?: string;
  logLevel?: string;
}

const submitSchema = z.object({
  research_question: z.string({ required_error: "research_question is required" }),
});
const idParamSchema = z.object({ id: z.string().uuid() });
const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

const OPEN_PATHS = new Set(["/healthz", "/metrics"]);

function parseJobId(params: unknown) {
  const parsed = idParamSchema.safeParse(params);
  if (!parsed.success) {
    const raw = z.object({ id: z.string() }).safeParse(params);
    throw new NotFoundError(raw.success ? raw.data.id : "unknown");
  }
  return parsed.data.id;
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({
    logger: deps.logLevel === "silent" ? false : { level: deps.logLevel ?? "info" },
  });
  await app.register(sensible);

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ValidationError) {
      return reply.code(422).send({
        error: "ValidationError",
        details: { message: error.message, ...error.details },
      });
    }
    if (error instanceof ZodError) {
      return reply.code(422).send({
        error: "ValidationError",
        details: {
          issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
        },
      });
    }
    if (error instanceof NotFoundError) {
      return reply.code(404).send({ error: "NotFound", details: { message: error.message } });
    }
    if (error instanceof NotReadyError) {
      return reply.code(409).send({
        error: "NotReady",
        details: { message: error.message, status: error.status },
      });
    }
    if (error.statusCode && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: error.name, details: { message: error.message } });
    }
    request.log.error({ err: error }, "Request failed");
    return reply.code(500).send({ error: "InternalError" });
  });

  app.addHook("onRequest", async (request) => {
    const [path] = request.url.split("?", 1);
    if (!deps.apiKey || OPEN_PATHS.has(path)) {
      return;
    }
    if (request.headers["x-api-key"] !== deps.apiKey) {
      throw app.httpErrors.unauthorized("Invalid or missing API key");
    }
  });

  app.get("/healthz", async () => ({ status: "ok" }));
  app.get("/metrics", async (_, reply) => {
    reply.header("content-type", metricsRegistry.contentType);
    return metricsRegistry.metrics();
  });

  app.post("/api/v1/analyze", async (request, reply) => {
    const body = submitSchema.parse(request.body ?? {});
    const job = await deps.orchestrator.submit(body.research_question);
    reply.code(202);
    return { analysis_id: job.id, status: job.status };
  });

  app.get("/api/v1/analyze", async (request) => {
    const query = listQuerySchema.parse(request.query ?? {});
    const analyses = await deps.facade.listRecent(query.limit ?? 20);
    return { analyses };
  });

  app.get("/api/v1/analyze/:id/status", async (request) => {
    return deps.facade.statusOf(parseJobId(request.params));
  });

  app.get("/api/v1/analyze/:id", async (request) => {
    return deps.facade.resultOf(parseJobId(request.params));
  });

  app.post("/api/v1/analyze/:id/cancel", async (request) => {
    const job = await deps.orchestrator.cancel(parseJobId(request.params));
    return toStatusView(job);
  });

  return app;
}
