import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, DEFAULT_TIMEOUT_MS } from "../constants";
import { CommitMessage } from "../formatter/commitMessage";
import { parseCommitText } from "../formatter/commitParser";
import { GitDiff } from "../git/diff";
import { getCatalogEntry, staticFallbacks } from "./catalog";
import { COMMIT_SYSTEM_PROMPT } from "./chatCompletions";
import { ProviderErrorGuide, isRecord, postJson, requireText } from "./http";
import { buildCommitPrompt } from "./prompt";
import { AiProvider, ProviderCommonConfig } from "./provider";

export const ANTHROPIC_ENDPOINT = "https://api.anthropic.com/v1/messages";
export const ANTHROPIC_API_VERSION = "2023-06-01";

export interface AnthropicProviderConfig extends ProviderCommonConfig {
  apiKey: string;
  model?: string;
  endpoint?: string;
}

/** First `text` block of a Messages API response. */
export function extractAnthropicText(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.content)) return undefined;
  for (const block of data.content) {
    if (isRecord(block) && block.type === "text" && typeof block.text === "string") {
      return block.text;
    }
  }
  return undefined;
}

export class AnthropicProvider implements AiProvider {
  public readonly name = "anthropic";
  readonly model: string;
  readonly endpoint: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly templateDirectory?: string;
  private readonly guide: ProviderErrorGuide;

  constructor(config: AnthropicProviderConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model || getCatalogEntry(this.name).defaultModel;
    this.endpoint = config.endpoint || ANTHROPIC_ENDPOINT;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.templateDirectory = config.templateDirectory;
    this.guide = {
      provider: this.name,
      label: "Anthropic",
      keyUrl: "https://console.anthropic.com/settings/keys",
      envVar: "ANTHROPIC_API_KEY",
      keyExample: "sk-ant-...",
      fallbackProviders: config.fallbackProviders ?? staticFallbacks(this.name),
      unavailableStatuses: [529],
    };
  }

  validateConfig(): string[] {
    const errors: string[] = [];
    if (!this.apiKey.trim()) {
      errors.push(`Anthropic API key is required. Set ANTHROPIC_API_KEY or get one at: ${this.guide.keyUrl}`);
    }
    if (!this.model.trim()) {
      errors.push("Anthropic model name must not be empty");
    }
    return errors;
  }

  async generateCommitMessage(diff: GitDiff): Promise<CommitMessage> {
    const prompt = buildCommitPrompt(this.name, diff, this.templateDirectory);

    const data = await postJson({
      url: this.endpoint,
      headers: {
        "x-api-key": this.apiKey,
        "anthropic-version": ANTHROPIC_API_VERSION,
      },
      body: {
        model: this.model,
        max_tokens: DEFAULT_MAX_TOKENS,
        temperature: DEFAULT_TEMPERATURE,
        system: COMMIT_SYSTEM_PROMPT,
        messages: [{ role: "user", content: prompt }],
      },
      timeoutMs: this.timeoutMs,
      guide: this.guide,
    });

    return parseCommitText(requireText(this.guide, extractAnthropicText(data)));
  }
}
