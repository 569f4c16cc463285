/**
 * Provider credential resolution
 *
 * Read once at process start and passed into the orchestrator explicitly.
 */

import type { ProviderCredentials } from "../../models/research-result";

type Env = Record<string, string | undefined>;

export const CREDENTIAL_ENV_VARS = {
  openrouter: "OPENROUTER_API_KEY",
  groq: "GROQ_API_KEY",
} as const;

function readKey(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Resolve provider keys from the environment; blank values count as absent
 */
export function resolveCredentials(env: Env = process.env): ProviderCredentials {
  const credentials: ProviderCredentials = {};

  const openrouter = readKey(env, CREDENTIAL_ENV_VARS.openrouter);
  if (openrouter) {
    credentials.openrouter = openrouter;
  }

  const groq = readKey(env, CREDENTIAL_ENV_VARS.groq);
  if (groq) {
    credentials.groq = groq;
  }

  return Object.freeze(credentials);
}
