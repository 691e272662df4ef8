import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, DEFAULT_TIMEOUT_MS } from "../constants";
import { CommitMessage } from "../formatter/commitMessage";
import { parseCommitText } from "../formatter/commitParser";
import { GitDiff } from "../git/diff";
import { staticFallbacks } from "./catalog";
import { buildChatCompletionBody, extractChatCompletionText } from "./chatCompletions";
import { ProviderErrorGuide, postJson, requireText } from "./http";
import { buildCommitPrompt } from "./prompt";
import { AiProvider, ProviderCommonConfig } from "./provider";

/** Backends that speak the OpenAI chat-completions format directly. */
export type OpenAiCompatibleName = "openai" | "deepseek";

interface CompatibleProfile {
  label: string;
  endpoint: string;
  defaultModel: string;
  keyUrl: string;
  envVar: string;
  keyExample: string;
}

const PROFILES: Record<OpenAiCompatibleName, CompatibleProfile> = {
  openai: {
    label: "OpenAI",
    endpoint: "https://api.openai.com/v1/chat/completions",
    defaultModel: "gpt-4o-mini",
    keyUrl: "https://platform.openai.com/api-keys",
    envVar: "OPENAI_API_KEY",
    keyExample: "sk-...",
  },
  deepseek: {
    label: "DeepSeek",
    endpoint: "https://api.deepseek.com/chat/completions",
    defaultModel: "deepseek-chat",
    keyUrl: "https://platform.deepseek.com/api_keys",
    envVar: "DEEPSEEK_API_KEY",
    keyExample: "sk-...",
  },
};

export interface OpenAiProviderConfig extends ProviderCommonConfig {
  providerName?: OpenAiCompatibleName;
  apiKey: string;
  model?: string;
  endpoint?: string;
  temperature?: number;
  maxTokens?: number;
}

export class OpenAiProvider implements AiProvider {
  public readonly name: OpenAiCompatibleName;
  readonly endpoint: string;
  readonly model: string;
  private readonly apiKey: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;
  private readonly templateDirectory?: string;
  private readonly guide: ProviderErrorGuide;

  constructor(config: OpenAiProviderConfig) {
    this.name = config.providerName || "openai";
    const profile = PROFILES[this.name];
    this.endpoint = config.endpoint || profile.endpoint;
    this.apiKey = config.apiKey;
    this.model = config.model || profile.defaultModel;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.templateDirectory = config.templateDirectory;
    this.guide = {
      provider: this.name,
      label: profile.label,
      keyUrl: profile.keyUrl,
      envVar: profile.envVar,
      keyExample: profile.keyExample,
      fallbackProviders: config.fallbackProviders ?? staticFallbacks(this.name),
    };
  }

  validateConfig(): string[] {
    const errors: string[] = [];
    if (!this.apiKey.trim()) {
      errors.push(`${this.guide.label} API key is required. Set ${this.guide.envVar} or get one at: ${this.guide.keyUrl}`);
    }
    if (!this.model.trim()) {
      errors.push(`${this.guide.label} model name must not be empty`);
    }
    return errors;
  }

  async generateCommitMessage(diff: GitDiff): Promise<CommitMessage> {
    const prompt = buildCommitPrompt(this.name, diff, this.templateDirectory);

    const data = await postJson({
      url: this.endpoint,
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: buildChatCompletionBody(this.model, prompt, this.temperature, this.maxTokens),
      timeoutMs: this.timeoutMs,
      guide: this.guide,
    });

    return parseCommitText(requireText(this.guide, extractChatCompletionText(data)));
  }
}
