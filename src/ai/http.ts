import { GenerationError } from "../errors";
import { logger } from "../logger";
import { ProviderName, describeFallback } from "./catalog";

/** A fixed list, or one resolved only when a 503 actually needs it. */
export type FallbackProviders = readonly ProviderName[] | (() => readonly ProviderName[]);

/** What a backend tells the user when a call fails. */
export interface ProviderErrorGuide {
  provider: ProviderName;
  label: string;
  keyUrl?: string;
  envVar?: string;
  keyExample?: string;
  fallbackProviders: FallbackProviders;
  /** Statuses besides 503 that mean the backend is temporarily unavailable. */
  unavailableStatuses?: readonly number[];
  networkHint?: string;
  statusHints?: Partial<Record<number, string>>;
}

export interface PostJsonRequest {
  url: string;
  headers?: Record<string, string>;
  body: unknown;
  timeoutMs: number;
  guide: ProviderErrorGuide;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pulls a readable message out of an error response body: `error.message`,
 * a plain string `error`, the raw text, or "Unknown error".
 */
export function extractErrorMessage(raw: string): string {
  const text = raw.trim();
  if (!text) return "Unknown error";

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text;
  }

  if (isRecord(parsed)) {
    const { error } = parsed;
    if (typeof error === "string" && error.trim()) {
      return error.trim();
    }
    if (isRecord(error) && typeof error.message === "string" && error.message.trim()) {
      return error.message.trim();
    }
  }
  return text;
}

function formatFallbacks(fallbacks: FallbackProviders): string[] {
  const names = typeof fallbacks === "function" ? fallbacks() : fallbacks;
  if (!names.length) return [];
  const width = Math.max(...names.map((name) => name.length)) + 2;
  return ["", "Try alternative providers:", ...names.map((name) => `  --provider ${name.padEnd(width)}${describeFallback(name)}`)];
}

export function classifyHttpError(guide: ProviderErrorGuide, status: number, errorMessage: string): GenerationError {
  const { label, provider } = guide;

  if (status === 401) {
    const lines = [`${label} API error (401 Unauthorized): ${errorMessage}`];
    if (guide.keyUrl) {
      lines.push("", `Get your API key at: ${guide.keyUrl}`);
    }
    if (guide.envVar) {
      lines.push(`Then: export ${guide.envVar}="${guide.keyExample ?? "..."}"`);
    }
    return new GenerationError(lines.join("\n"), { provider, kind: "unauthorized", status });
  }

  if (status === 429) {
    return new GenerationError(
      [`${label} API error (429 Rate Limit): ${errorMessage}`, "", "Rate limit exceeded. Try again later (no automatic retry)."].join("\n"),
      { provider, kind: "rate-limited", status }
    );
  }

  if (status === 503 || guide.unavailableStatuses?.includes(status)) {
    const heading = status === 503 ? "503 Service Unavailable" : `${status} Overloaded`;
    return new GenerationError(
      [`${label} API error (${heading}): ${errorMessage}`, ...formatFallbacks(guide.fallbackProviders)].join("\n"),
      { provider, kind: "unavailable", status }
    );
  }

  const hint = guide.statusHints?.[status];
  const lines = [`${label} API error (${status}): ${errorMessage}`];
  if (hint) {
    lines.push("", hint);
  }
  return new GenerationError(lines.join("\n"), { provider, kind: "http", status });
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

function networkError(guide: ProviderErrorGuide, error: unknown, timeoutMs: number): GenerationError {
  const reason = isTimeout(error)
    ? `timed out after ${Math.round(timeoutMs / 1000)}s`
    : `failed: ${error instanceof Error ? error.message : String(error)}`;
  const lines = [`${guide.label} request ${reason}`];
  if (guide.networkHint) {
    lines.push("", guide.networkHint);
  }
  return new GenerationError(lines.join("\n"), { provider: guide.provider, kind: "network", cause: error });
}

async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    logger.debug(`Could not read error body: ${error instanceof Error ? error.message : String(error)}`);
    return "";
  }
}

/**
 * Sends one JSON POST bounded by `timeoutMs` and returns the decoded body.
 * Non-2xx answers are turned into classified GenerationErrors; nothing is
 * retried.
 */
export async function postJson(request: PostJsonRequest): Promise<unknown> {
  const { url, headers = {}, body, timeoutMs, guide } = request;
  logger.debug(`${guide.label}: POST ${url}`);

  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw networkError(guide, error, timeoutMs);
  }

  if (!response.ok) {
    const message = extractErrorMessage(await readBody(response));
    logger.debug(`${guide.label}: HTTP ${response.status} ${message}`);
    throw classifyHttpError(guide, response.status, message);
  }

  try {
    return await response.json();
  } catch (error) {
    if (isTimeout(error)) {
      throw networkError(guide, error, timeoutMs);
    }
    throw new GenerationError(`${guide.label} returned a response that is not valid JSON`, {
      provider: guide.provider,
      kind: "invalid-response",
      cause: error,
    });
  }
}

/** Rejects a 2xx answer that carries no usable text. */
export function requireText(guide: ProviderErrorGuide, text: string | undefined): string {
  if (text === undefined || !text.trim()) {
    throw new GenerationError(`${guide.label} returned no commit message text`, {
      provider: guide.provider,
      kind: "invalid-response",
    });
  }
  return text;
}
