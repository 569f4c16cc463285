import fp from "fastify-plugin";
import type {
  ProviderCredentials,
  ResearchOrchestrator,
  SummaryEngine,
} from "@wiki-research/core";

export interface ResearchServices {
  orchestrator: ResearchOrchestrator;
  summaryEngine: SummaryEngine;
  credentials: ProviderCredentials;
}

declare module "fastify" {
  interface FastifyInstance {
    research: ResearchServices;
  }
}

/**
 * Decorates the app with the research pipeline. Services are built once at
 * startup and shared; each run still owns its own encyclopedia client.
 */
export default fp<ResearchServices>(
  async (app, opts) => {
    app.decorate("research", {
      orchestrator: opts.orchestrator,
      summaryEngine: opts.summaryEngine,
      credentials: opts.credentials,
    });

    const configured = opts.summaryEngine
      .describeProviders(opts.credentials)
      .filter((status) => status.configured)
      .map((status) => status.provider);

    app.log.info({ summaryProviders: configured }, "Research pipeline initialized");
  },
  { name: "research" }
);
