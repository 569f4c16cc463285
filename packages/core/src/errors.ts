/**
 * Research error taxonomy
 *
 * Only InvalidTopicError ever escapes a research run. The other codes are
 * recovered inside the pipeline and surface as result status or provider
 * attempts instead.
 */

export type ResearchErrorCode =
  | "INVALID_TOPIC"
  | "UPSTREAM_UNAVAILABLE"
  | "PROVIDER_FAILURE";

export class ResearchError extends Error {
  readonly code: ResearchErrorCode;

  constructor(code: ResearchErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ResearchError";
    this.code = code;
  }
}

/**
 * Topic was empty after trimming; raised before any network call
 */
export class InvalidTopicError extends ResearchError {
  constructor(message: string = "Topic must not be empty") {
    super("INVALID_TOPIC", message);
    this.name = "InvalidTopicError";
  }
}

/**
 * Encyclopedia request failed (status, network, timeout, missing extract)
 */
export class UpstreamUnavailableError extends ResearchError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super("UPSTREAM_UNAVAILABLE", message, options);
    this.name = "UpstreamUnavailableError";
    this.status = status;
  }
}

/**
 * A single summarization provider call failed
 */
export class ProviderFailureError extends ResearchError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: ErrorOptions) {
    super("PROVIDER_FAILURE", `${provider}: ${message}`, options);
    this.name = "ProviderFailureError";
    this.provider = provider;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
