/**
 * Research API server
 *
 * Loads .env and research-config.yaml, resolves provider credentials once,
 * and serves the research pipeline over HTTP.
 */

import * as dotenv from "dotenv";
import {
  ResearchOrchestrator,
  createLogger,
  createSummaryEngine,
  getConfigPath,
  loadConfig,
  resolveCredentials,
} from "@wiki-research/core";
import { buildApp } from "./app";

dotenv.config();

const config = loadConfig();
const credentials = resolveCredentials();
const summaryEngine = createSummaryEngine(config.summary, createLogger("summary-engine"));
const orchestrator = new ResearchOrchestrator({ config, credentials, summaryEngine });

const app = await buildApp({
  orchestrator,
  summaryEngine,
  credentials,
  logLevel: process.env.LOG_LEVEL || "info",
  rateLimitMax: Number(process.env.RESEARCH_RATE_LIMIT || 10),
});

const port = Number(process.env.PORT || 8080);
const host = process.env.HOST || "0.0.0.0";

// Startup log to aid operational visibility
app.log.info(
  {
    env: process.env.NODE_ENV || "development",
    port,
    config: getConfigPath() ?? "defaults",
  },
  "Starting research API server"
);

await app.listen({ host, port });
