import { DEFAULT_TEMPERATURE, DEFAULT_TIMEOUT_MS, DEFAULT_MAX_TOKENS } from "../constants";
import { CommitMessage } from "../formatter/commitMessage";
import { parseCommitText } from "../formatter/commitParser";
import { GitDiff } from "../git/diff";
import { getCatalogEntry, staticFallbacks } from "./catalog";
import { COMMIT_SYSTEM_PROMPT } from "./chatCompletions";
import { ProviderErrorGuide, isRecord, postJson, requireText } from "./http";
import { buildCommitPrompt } from "./prompt";
import { AiProvider, ProviderCommonConfig } from "./provider";

export const OLLAMA_BASE_URL = "http://localhost:11434";

export interface OllamaProviderConfig extends ProviderCommonConfig {
  model?: string;
  baseUrl?: string;
}

export function extractOllamaText(data: unknown): string | undefined {
  if (!isRecord(data)) return undefined;
  return typeof data.response === "string" ? data.response : undefined;
}

// Local models need no credentials; the server just has to be running.
export class OllamaProvider implements AiProvider {
  public readonly name = "ollama";
  readonly model: string;
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly templateDirectory?: string;
  private readonly guide: ProviderErrorGuide;

  constructor(config: OllamaProviderConfig = {}) {
    this.model = config.model ?? getCatalogEntry(this.name).defaultModel;
    this.baseUrl = (config.baseUrl || OLLAMA_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.templateDirectory = config.templateDirectory;
    this.guide = {
      provider: this.name,
      label: "Ollama",
      fallbackProviders: config.fallbackProviders ?? staticFallbacks(this.name),
      networkHint: `Is Ollama running at ${this.baseUrl}? Start it with: ollama serve`,
      statusHints: { 404: `Model not found locally. Pull it with: ollama pull ${this.model}` },
    };
  }

  validateConfig(): string[] {
    if (!this.model.trim()) {
      return ["Ollama model name must not be empty (e.g., 'qwen2.5:7b')"];
    }
    return [];
  }

  async generateCommitMessage(diff: GitDiff): Promise<CommitMessage> {
    const prompt = buildCommitPrompt(this.name, diff, this.templateDirectory);

    const data = await postJson({
      url: `${this.baseUrl}/api/generate`,
      body: {
        model: this.model,
        system: COMMIT_SYSTEM_PROMPT,
        prompt,
        stream: false,
        options: {
          temperature: DEFAULT_TEMPERATURE,
          num_predict: DEFAULT_MAX_TOKENS,
        },
      },
      timeoutMs: this.timeoutMs,
      guide: this.guide,
    });

    return parseCommitText(requireText(this.guide, extractOllamaText(data)));
  }
}
