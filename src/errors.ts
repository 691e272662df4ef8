export type GenerationErrorKind =
  | "unauthorized"
  | "rate-limited"
  | "unavailable"
  | "http"
  | "network"
  | "invalid-response";

/** Raised before any network activity when settings cannot work. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export interface GenerationErrorDetails {
  provider: string;
  kind: GenerationErrorKind;
  status?: number;
  cause?: unknown;
}

/**
 * A failed generation call. `kind` classifies the failure so callers can pick
 * another provider instead of retrying blindly.
 */
export class GenerationError extends Error {
  readonly provider: string;
  readonly kind: GenerationErrorKind;
  readonly status?: number;

  constructor(message: string, details: GenerationErrorDetails) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "GenerationError";
    this.provider = details.provider;
    this.kind = details.kind;
    this.status = details.status;
  }
}
