import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import {
  REPORT_CONTENT_TYPES,
  REPORT_FORMATS,
  formatReport,
} from "@wiki-research/core";

export interface ResearchRouteOptions {
  rateLimitMax?: number; // Research runs per client per minute
}

const researchBodySchema = z.object({
  topic: z.string(),
  maxSources: z.number().int().min(1).max(20).optional(),
  timeoutSeconds: z.number().int().min(30).max(300).optional(),
  depth: z.number().int().min(1).max(3).optional(),
});

const formatQuerySchema = z.object({
  format: z.enum(REPORT_FORMATS).default("json"),
});

const providerParamsSchema = z.object({
  provider: z.string(),
});

// Research routes: run a pass, inspect provider configuration. Errors are
// shaped by the errors plugin.
const routes: FastifyPluginAsync<ResearchRouteOptions> = async (app, opts) => {
  const { orchestrator, summaryEngine, credentials } = app.research;

  app.post(
    "/",
    {
      config: {
        rateLimit: { max: opts.rateLimitMax ?? 10, timeWindow: "1 minute" },
      },
    },
    async (req, rep) => {
      const body = researchBodySchema.parse(req.body);
      const { format } = formatQuerySchema.parse(req.query);

      const result = await orchestrator.run(body);

      if (format === "json") {
        return rep.status(200).send(result);
      }
      return rep
        .status(200)
        .type(REPORT_CONTENT_TYPES[format])
        .send(formatReport(result, format));
    }
  );

  app.get("/providers", async (_req, rep) => {
    return rep.send({ providers: summaryEngine.describeProviders(credentials) });
  });

  app.post(
    "/providers/:provider/verify",
    {
      config: {
        rateLimit: { max: 5, timeWindow: "1 minute" },
      },
    },
    async (req, rep) => {
      const { provider } = providerParamsSchema.parse(req.params);
      if (!summaryEngine.hasProvider(provider)) {
        return rep.status(404).send({
          error: { code: "unknown_provider", message: `Unknown provider: ${provider}` },
        });
      }

      const check = await summaryEngine.verifyProvider(provider, credentials);
      return rep.status(200).send(check);
    }
  );
};

export default routes;
