import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, describe, expect, it } from "vitest";
import {
  DEFAULT_CONFIG,
  clearConfigCache,
  getConfig,
  getConfigPath,
  getEncyclopediaApiUrl,
  loadConfig,
  resolveConfig,
  resolveCredentials,
  withConfigOverrides,
} from "../src";

function writeTempConfig(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "wiki-research-config-"));
  const file = path.join(dir, "research-config.yaml");
  fs.writeFileSync(file, contents, "utf8");
  return file;
}

describe("resolveConfig", () => {
  it("deep merges partial settings over the defaults", () => {
    const config = resolveConfig({ aggregation: { extractCharCap: 800 } });

    expect(config.aggregation).toEqual({ extractCharCap: 800, separator: "\n\n---\n\n" });
    expect(config.limits).toEqual(DEFAULT_CONFIG.limits);
  });

  it("rejects out-of-range values", () => {
    expect(() => resolveConfig({ encyclopedia: { concurrency: 0 } })).toThrow();
    expect(() => resolveConfig({ summary: { temperature: 5 } })).toThrow();
  });

  it("applies runtime overrides without touching the base", () => {
    const config = withConfigOverrides({ encyclopedia: { language: "de" } }, DEFAULT_CONFIG);

    expect(config.encyclopedia.language).toBe("de");
    expect(DEFAULT_CONFIG.encyclopedia.language).toBe("en");
  });
});

describe("getEncyclopediaApiUrl", () => {
  it("derives the endpoint from the language", () => {
    expect(getEncyclopediaApiUrl(DEFAULT_CONFIG.encyclopedia)).toBe(
      "https://en.wikipedia.org/w/api.php"
    );
    expect(getEncyclopediaApiUrl({ ...DEFAULT_CONFIG.encyclopedia, language: "de" })).toBe(
      "https://de.wikipedia.org/w/api.php"
    );
  });

  it("prefers an explicit apiUrl", () => {
    const apiUrl = "https://wiki.example.org/w/api.php";
    expect(getEncyclopediaApiUrl({ ...DEFAULT_CONFIG.encyclopedia, apiUrl })).toBe(apiUrl);
  });
});

describe("loadConfig", () => {
  afterEach(() => {
    clearConfigCache();
  });

  it("reads a YAML file", () => {
    const file = writeTempConfig(
      ["aggregation:", "  extractCharCap: 600", "limits:", "  defaultSources: 4", ""].join("\n")
    );

    const config = loadConfig(file);

    expect(config.aggregation.extractCharCap).toBe(600);
    expect(config.limits.defaultSources).toBe(4);
    expect(config.summary).toEqual(DEFAULT_CONFIG.summary);
    expect(getConfigPath()).toBe(file);
  });

  it("serves the loaded file from getConfig until the cache is cleared", () => {
    const file = writeTempConfig("encyclopedia:\n  language: fr\n");

    const config = loadConfig(file);

    expect(getConfig()).toBe(config);
    expect(getConfig().encyclopedia.language).toBe("fr");

    clearConfigCache();
    expect(getConfigPath()).toBeNull();
  });

  it("falls back to defaults when the file is missing", () => {
    const missing = path.join(os.tmpdir(), "wiki-research-missing", "research-config.yaml");

    expect(loadConfig(missing)).toEqual(DEFAULT_CONFIG);
    expect(getConfigPath()).toBeNull();
  });

  it("falls back to defaults when the file is invalid", () => {
    const file = writeTempConfig("encyclopedia:\n  concurrency: 99\n");

    expect(loadConfig(file)).toEqual(DEFAULT_CONFIG);
    expect(getConfigPath()).toBeNull();
  });
});

describe("resolveCredentials", () => {
  it("reads and trims provider keys", () => {
    expect(
      resolveCredentials({ OPENROUTER_API_KEY: " test-openrouter-key ", GROQ_API_KEY: "test-groq-key" })
    ).toEqual({ openrouter: "test-openrouter-key", groq: "test-groq-key" });
  });

  it("treats blank values as absent", () => {
    const credentials = resolveCredentials({ OPENROUTER_API_KEY: "   ", GROQ_API_KEY: "" });

    expect(credentials).toEqual({});
    expect(Object.isFrozen(credentials)).toBe(true);
  });
});
