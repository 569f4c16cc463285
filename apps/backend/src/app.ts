import Fastify, { type FastifyInstance } from "fastify";
import fastifyCors from "@fastify/cors";
import fastifyRateLimit from "@fastify/rate-limit";
import { REDACT_PATHS } from "@wiki-research/core";
import errors from "./plugins/errors";
import research, { type ResearchServices } from "./plugins/research";
import researchRoutes from "./routes/researchRoute";

export interface BuildAppOptions extends ResearchServices {
  logLevel?: string | false; // false disables request logging (tests)
  rateLimitMax?: number;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  // Structured logging with credentials redacted from every record
  const app = Fastify({
    logger:
      options.logLevel === false
        ? false
        : {
            level: options.logLevel ?? "info",
            redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
          },
    bodyLimit: 1048576,
  });

  await app.register(fastifyCors, {
    origin: true,
    allowedHeaders: ["Content-Type", "Accept", "Origin"],
    methods: ["GET", "POST", "OPTIONS"],
  });

  // errors early to ensure consistent error shaping
  await app.register(errors);
  await app.register(fastifyRateLimit, { global: false });
  await app.register(research, {
    orchestrator: options.orchestrator,
    summaryEngine: options.summaryEngine,
    credentials: options.credentials,
  });

  await app.register(researchRoutes, {
    prefix: "/api/v1/research",
    rateLimitMax: options.rateLimitMax,
  });

  app.get("/healthz", async (_req, rep) => {
    return rep.send({ ok: true });
  });

  return app;
}
