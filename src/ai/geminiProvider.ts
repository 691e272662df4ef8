import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, DEFAULT_TIMEOUT_MS } from "../constants";
import { CommitMessage } from "../formatter/commitMessage";
import { parseCommitText } from "../formatter/commitParser";
import { GitDiff } from "../git/diff";
import { getCatalogEntry, staticFallbacks } from "./catalog";
import { COMMIT_SYSTEM_PROMPT } from "./chatCompletions";
import { ProviderErrorGuide, isRecord, postJson, requireText } from "./http";
import { buildCommitPrompt } from "./prompt";
import { AiProvider, ProviderCommonConfig } from "./provider";

export const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

export interface GeminiProviderConfig extends ProviderCommonConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
}

/** Joins the text parts of the first candidate. */
export function extractGeminiText(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.candidates)) return undefined;
  const candidate: unknown = data.candidates[0];
  if (!isRecord(candidate) || !isRecord(candidate.content) || !Array.isArray(candidate.content.parts)) {
    return undefined;
  }
  const texts = candidate.content.parts
    .map((part: unknown) => (isRecord(part) && typeof part.text === "string" ? part.text : ""))
    .filter(Boolean);
  return texts.length ? texts.join("") : undefined;
}

export class GeminiProvider implements AiProvider {
  public readonly name = "gemini";
  readonly model: string;
  readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly templateDirectory?: string;
  private readonly guide: ProviderErrorGuide;

  constructor(config: GeminiProviderConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model || getCatalogEntry(this.name).defaultModel;
    this.baseUrl = (config.baseUrl || GEMINI_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.templateDirectory = config.templateDirectory;
    this.guide = {
      provider: this.name,
      label: "Gemini",
      keyUrl: "https://aistudio.google.com/app/apikey",
      envVar: "GEMINI_API_KEY",
      keyExample: "AIza...",
      fallbackProviders: config.fallbackProviders ?? staticFallbacks(this.name),
    };
  }

  validateConfig(): string[] {
    const errors: string[] = [];
    if (!this.apiKey.trim()) {
      errors.push(`Gemini API key is required. Set GEMINI_API_KEY or GOOGLE_API_KEY, or get one at: ${this.guide.keyUrl}`);
    }
    if (!this.model.trim()) {
      errors.push("Gemini model name must not be empty");
    }
    return errors;
  }

  async generateCommitMessage(diff: GitDiff): Promise<CommitMessage> {
    const prompt = buildCommitPrompt(this.name, diff, this.templateDirectory);

    const data = await postJson({
      url: `${this.baseUrl}/models/${encodeURIComponent(this.model)}:generateContent`,
      headers: { "x-goog-api-key": this.apiKey },
      body: {
        systemInstruction: { parts: [{ text: COMMIT_SYSTEM_PROMPT }] },
        contents: [{ role: "user", parts: [{ text: prompt }] }],
        generationConfig: {
          temperature: DEFAULT_TEMPERATURE,
          maxOutputTokens: DEFAULT_MAX_TOKENS,
        },
      },
      timeoutMs: this.timeoutMs,
      guide: this.guide,
    });

    return parseCommitText(requireText(this.guide, extractGeminiText(data)));
  }
}
