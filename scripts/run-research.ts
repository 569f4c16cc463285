/**
 * Research Run Script
 *
 * Runs one research pass for a topic and prints the report.
 *
 * Usage:
 *   npx tsx scripts/run-research.ts "<topic>" [options]
 *
 * Example:
 *   npx tsx scripts/run-research.ts "Turing machine" --sources=3 --format=markdown
 *
 * Options:
 *   --sources=N   Max sources to keep, 1-20 (default: from config)
 *   --timeout=S   Fetch budget in seconds, 30-300 (default: from config)
 *   --depth=D     Candidate pool multiplier, 1-3 (default: from config)
 *   --format=F    markdown | text | json (default: markdown)
 *   --save        Also write the report to <topic>_report.<ext>
 *
 * Environment variables (optional, enable AI summaries):
 *   OPENROUTER_API_KEY
 *   GROQ_API_KEY
 */

import * as dotenv from "dotenv";
import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import {
  InvalidTopicError,
  REPORT_FORMATS,
  errorMessage,
  ResearchOrchestrator,
  formatReport,
  loadConfig,
  reportFilename,
  resolveCredentials,
  type ReportFormat,
} from "../packages/core/src";

export interface RunResearchArgs {
  topic: string;
  maxSources?: number;
  timeoutSeconds?: number;
  depth?: number;
  format: ReportFormat;
  save: boolean;
}

function numericOption(args: string[], name: string): number | undefined {
  const arg = args.find((candidate) => candidate.startsWith(`--${name}=`));
  if (!arg) {
    return undefined;
  }
  const value = parseInt(arg.split("=")[1], 10);
  if (Number.isNaN(value)) {
    throw new Error(`--${name} must be a number`);
  }
  return value;
}

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

/**
 * Parse CLI arguments (without the node/script prefix)
 */
export function parseResearchArgs(args: string[]): RunResearchArgs {
  const topic = args
    .filter((arg) => !arg.startsWith("--"))
    .join(" ")
    .trim();

  const formatArg = args.find((arg) => arg.startsWith("--format="));
  const format = formatArg ? formatArg.split("=")[1] : "markdown";
  if (!isReportFormat(format)) {
    throw new Error(`--format must be one of: ${REPORT_FORMATS.join(", ")}`);
  }

  return {
    topic,
    maxSources: numericOption(args, "sources"),
    timeoutSeconds: numericOption(args, "timeout"),
    depth: numericOption(args, "depth"),
    format,
    save: args.includes("--save"),
  };
}

function printUsage(): void {
  console.error("Usage:");
  console.error('  npx tsx scripts/run-research.ts "<topic>" [options]\n');
  console.error("Options:");
  console.error("  --sources=N  --timeout=S  --depth=D  --format=markdown|text|json  --save\n");
}

async function main(): Promise<void> {
  dotenv.config({ path: path.resolve(process.cwd(), ".env") });

  let args: RunResearchArgs;
  try {
    args = parseResearchArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`\n✗ Error: ${errorMessage(error)}\n`);
    printUsage();
    process.exit(1);
  }

  if (!args.topic) {
    console.error("\n✗ Error: Missing research topic\n");
    printUsage();
    process.exit(1);
  }

  const config = loadConfig();
  const credentials = resolveCredentials();
  const orchestrator = new ResearchOrchestrator({ config, credentials });

  if (!credentials.openrouter && !credentials.groq) {
    console.error("⚠️  No OPENROUTER_API_KEY or GROQ_API_KEY set; the summary will be skipped.\n");
  }

  try {
    const result = await orchestrator.run(args);
    const report = formatReport(result, args.format);
    console.log(report);

    if (args.save) {
      const filename = reportFilename(result.topic, args.format);
      try {
        fs.writeFileSync(path.resolve(process.cwd(), filename), report, "utf8");
        console.error(`✓ Report saved to ${filename}`);
      } catch (error) {
        console.error(`\n✗ Could not save report to ${filename}: ${errorMessage(error)}\n`);
        process.exitCode = 1;
      }
    }

    if (result.status === "no_results") {
      process.exitCode = 2;
    }
  } catch (error) {
    if (error instanceof InvalidTopicError) {
      console.error(`\n✗ ${error.message}\n`);
      process.exit(1);
    }
    throw error;
  }
}

// Run if called directly
if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  await main();
}
