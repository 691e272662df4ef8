import { APP_NAME, APP_URL, DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, DEFAULT_TIMEOUT_MS } from "../constants";
import { ConfigurationError } from "../errors";
import { CommitMessage } from "../formatter/commitMessage";
import { parseCommitText } from "../formatter/commitParser";
import { GitDiff } from "../git/diff";
import { staticFallbacks } from "./catalog";
import { buildChatCompletionBody, extractChatCompletionText } from "./chatCompletions";
import { ProviderErrorGuide, postJson, requireText } from "./http";
import { buildCommitPrompt } from "./prompt";
import { AiProvider, ProviderCommonConfig } from "./provider";

export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";
export const OPENROUTER_KEYS_URL = "https://openrouter.ai/keys";

const MODEL_PATTERN = /^[a-z0-9-]+\/[a-z0-9-.]+$/;
const MIN_KEY_LENGTH = 10;

export interface OpenRouterProviderConfig extends ProviderCommonConfig {
  apiKey: string;
  /** `vendor/model-name`, e.g. `openai/gpt-4o-mini`. */
  model: string;
  baseUrl?: string;
}

export function isValidOpenRouterModel(model: string): boolean {
  return MODEL_PATTERN.test(model);
}

function invalidModelMessage(model: string): string {
  return `Invalid model format '${model}'. Must be 'vendor/model-name' (e.g., 'openai/gpt-4o')`;
}

/**
 * OpenRouter gateway. Speaks the OpenAI chat-completions format and routes to
 * whichever vendor the model prefix names.
 */
export class OpenRouterProvider implements AiProvider {
  public readonly name = "openrouter";
  readonly apiKey: string;
  readonly model: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  private readonly templateDirectory?: string;
  private readonly guide: ProviderErrorGuide;

  constructor(config: OpenRouterProviderConfig) {
    if (!isValidOpenRouterModel(config.model)) {
      throw new ConfigurationError(invalidModelMessage(config.model));
    }

    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = (config.baseUrl || OPENROUTER_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.templateDirectory = config.templateDirectory;
    this.guide = {
      provider: this.name,
      label: "OpenRouter",
      keyUrl: OPENROUTER_KEYS_URL,
      envVar: "OPENROUTER_API_KEY",
      keyExample: "sk-or-v1-...",
      fallbackProviders: config.fallbackProviders ?? staticFallbacks(this.name),
    };
  }

  validateConfig(): string[] {
    const errors: string[] = [];
    if (!this.apiKey || this.apiKey.length < MIN_KEY_LENGTH) {
      errors.push(`OpenRouter API key is required. Get yours at: ${OPENROUTER_KEYS_URL}`);
    }
    if (!isValidOpenRouterModel(this.model)) {
      errors.push(invalidModelMessage(this.model));
    }
    return errors;
  }

  async generateCommitMessage(diff: GitDiff): Promise<CommitMessage> {
    const prompt = buildCommitPrompt(this.name, diff, this.templateDirectory);

    const data = await postJson({
      url: `${this.baseUrl}/chat/completions`,
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        "HTTP-Referer": APP_URL,
        "X-Title": APP_NAME,
      },
      body: buildChatCompletionBody(this.model, prompt, DEFAULT_TEMPERATURE, DEFAULT_MAX_TOKENS),
      timeoutMs: this.timeoutMs,
      guide: this.guide,
    });

    return parseCommitText(requireText(this.guide, extractChatCompletionText(data)));
  }
}
