/**
 * Research Configuration System
 *
 * Loads and manages configuration from research-config.yaml
 * Provides strongly typed access to all configurable settings.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { createLogger } from "../../utils/logger";

const logger = createLogger("config");

// =============================================================================
// Schema
// =============================================================================

const providerEndpointSchema = z.object({
  baseUrl: z.string().url(),
  model: z.string().min(1),
  timeoutMs: z.number().int().positive(),
});

/**
 * Encyclopedia (MediaWiki Action API) settings
 */
const encyclopediaSchema = z.object({
  language: z.string().min(2),
  apiUrl: z.string().url().optional(), // Defaults to https://{language}.wikipedia.org/w/api.php
  requestTimeoutMs: z.number().int().positive(),
  userAgent: z.string().min(1),
  concurrency: z.number().int().min(1).max(10),
});

/**
 * Content aggregation settings
 */
const aggregationSchema = z.object({
  extractCharCap: z.number().int().positive(),
  separator: z.string(),
});

/**
 * Bounds applied to caller-supplied run parameters
 */
const limitsSchema = z.object({
  minSources: z.number().int().min(1),
  maxSources: z.number().int().min(1),
  defaultSources: z.number().int().min(1),
  minTimeoutSeconds: z.number().int().positive(),
  maxTimeoutSeconds: z.number().int().positive(),
  defaultTimeoutSeconds: z.number().int().positive(),
  minDepth: z.number().int().min(1),
  maxDepth: z.number().int().min(1),
  defaultDepth: z.number().int().min(1),
  maxCandidates: z.number().int().min(1),
});

const summarySchema = z.object({
  temperature: z.number().min(0).max(2),
  providers: z.object({
    openrouter: providerEndpointSchema,
    groq: providerEndpointSchema,
  }),
});

export const researchConfigSchema = z.object({
  encyclopedia: encyclopediaSchema,
  aggregation: aggregationSchema,
  limits: limitsSchema,
  summary: summarySchema,
});

export type ProviderEndpointConfig = z.infer<typeof providerEndpointSchema>;
export type EncyclopediaConfig = z.infer<typeof encyclopediaSchema>;
export type AggregationConfig = z.infer<typeof aggregationSchema>;
export type LimitsConfig = z.infer<typeof limitsSchema>;
export type SummaryConfig = z.infer<typeof summarySchema>;
export type ResearchConfig = z.infer<typeof researchConfigSchema>;

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

// =============================================================================
// Default Configuration
// =============================================================================

/**
 * Default configuration values (used when config file is not found)
 */
export const DEFAULT_CONFIG: ResearchConfig = {
  encyclopedia: {
    language: "en",
    requestTimeoutMs: 10000,
    userAgent: "wiki-research/1.0 (research pipeline; contact via repository)",
    concurrency: 3,
  },
  aggregation: {
    extractCharCap: 1200,
    separator: "\n\n---\n\n",
  },
  limits: {
    minSources: 1,
    maxSources: 20,
    defaultSources: 5,
    minTimeoutSeconds: 30,
    maxTimeoutSeconds: 300,
    defaultTimeoutSeconds: 120,
    minDepth: 1,
    maxDepth: 3,
    defaultDepth: 2,
    maxCandidates: 50,
  },
  summary: {
    temperature: 0.7,
    providers: {
      openrouter: {
        baseUrl: "https://openrouter.ai/api/v1",
        model: "tngtech/deepseek-r1t2-chimera:free",
        timeoutMs: 60000,
      },
      groq: {
        baseUrl: "https://api.groq.com/openai/v1",
        model: "llama-3.1-8b-instant",
        timeoutMs: 60000,
      },
    },
  },
};

// =============================================================================
// Configuration Loader
// =============================================================================

const CONFIG_FILENAME = "research-config.yaml";
const MAX_SEARCH_DEPTH = 10;

interface LoadedConfig {
  config: ResearchConfig;
  path: string | null; // null when running on defaults
}

let loaded: LoadedConfig | null = null;

/**
 * Directories from `startDir` towards the filesystem root, nearest first
 */
function* ancestorDirs(startDir: string): Generator<string> {
  let dir = path.resolve(startDir);
  for (let level = 0; level < MAX_SEARCH_DEPTH; level++) {
    yield dir;
    const parent = path.dirname(dir);
    if (parent === dir) {
      return;
    }
    dir = parent;
  }
}

function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const dir of ancestorDirs(startDir)) {
    const candidate = path.join(dir, CONFIG_FILENAME);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source taking precedence
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Merge raw settings over a base config and validate the outcome
 */
export function resolveConfig(
  raw: unknown,
  base: ResearchConfig = DEFAULT_CONFIG
): ResearchConfig {
  const merged = isPlainObject(raw) ? deepMerge(base, raw) : base;
  return researchConfigSchema.parse(merged);
}

function readConfigFile(filePath: string): ResearchConfig {
  return resolveConfig(yaml.load(fs.readFileSync(filePath, "utf8")));
}

/**
 * Load settings from `customPath`, or from the nearest research-config.yaml.
 * A missing or invalid file leaves the defaults in effect.
 */
export function loadConfig(customPath?: string): ResearchConfig {
  if (loaded && !customPath) {
    return loaded.config;
  }

  const filePath = customPath ?? findConfigFile();
  loaded = { config: DEFAULT_CONFIG, path: null };

  if (!filePath) {
    logger.warn(`${CONFIG_FILENAME} not found, using default configuration`);
    return loaded.config;
  }

  try {
    loaded = { config: readConfigFile(filePath), path: filePath };
    logger.info({ path: filePath }, "Loaded research config");
  } catch (error) {
    logger.error({ err: error, path: filePath }, "Invalid research config, using defaults");
  }
  return loaded.config;
}

export function getConfig(): ResearchConfig {
  return loaded ? loaded.config : loadConfig();
}

/**
 * Forget the loaded settings; the next getConfig() reads the file again
 */
export function clearConfigCache(): void {
  loaded = null;
}

/**
 * File the active settings came from, or null when running on defaults
 */
export function getConfigPath(): string | null {
  return loaded ? loaded.path : null;
}

/**
 * Override specific configuration values at runtime
 * Useful for testing or per-request customization
 */
export function withConfigOverrides(
  overrides: DeepPartial<ResearchConfig>,
  base: ResearchConfig = getConfig()
): ResearchConfig {
  return resolveConfig(overrides, base);
}

// =============================================================================
// Convenience Getters
// =============================================================================

/**
 * Resolved MediaWiki API endpoint for the configured language
 */
export function getEncyclopediaApiUrl(
  config: EncyclopediaConfig = getConfig().encyclopedia
): string {
  return config.apiUrl ?? `https://${config.language}.wikipedia.org/w/api.php`;
}
