export const PROVIDER_NAMES = ["openai", "anthropic", "gemini", "deepseek", "openrouter", "ollama"] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export interface ToolCheck {
  command: string;
  args: readonly string[];
}

export interface ProviderCatalogEntry {
  name: ProviderName;
  description: string;
  defaultModel: string;
  models: readonly string[];
  /** Any non-empty variable marks the provider as configured. */
  envVars: readonly string[];
  /** Local backends are detected by running a tool instead. */
  toolCheck?: ToolCheck;
}

export const PROVIDER_CATALOG: readonly ProviderCatalogEntry[] = [
  {
    name: "openai",
    description: "OpenAI GPT models",
    defaultModel: "gpt-4o-mini",
    models: ["gpt-4o", "gpt-4o-mini"],
    envVars: ["OPENAI_API_KEY"],
  },
  {
    name: "anthropic",
    description: "Anthropic Claude models",
    defaultModel: "claude-3-haiku-20240307",
    models: ["claude-3-opus", "claude-3-sonnet", "claude-3-haiku"],
    envVars: ["ANTHROPIC_API_KEY"],
  },
  {
    name: "gemini",
    description: "Google Gemini models",
    defaultModel: "gemini-2.0-flash-001",
    models: ["gemini-2.0-flash-001", "gemini-2.5-flash", "gemini-2.5-pro"],
    envVars: ["GEMINI_API_KEY", "GOOGLE_API_KEY"],
  },
  {
    name: "deepseek",
    description: "DeepSeek models (low cost per token)",
    defaultModel: "deepseek-chat",
    models: ["deepseek-chat", "deepseek-coder"],
    envVars: ["DEEPSEEK_API_KEY"],
  },
  {
    name: "openrouter",
    description: "OpenRouter (unified access to 100+ models)",
    defaultModel: "openai/gpt-4o-mini",
    models: [
      "openai/gpt-4o",
      "openai/gpt-4o-mini",
      "anthropic/claude-3-5-sonnet",
      "anthropic/claude-3-haiku",
      "google/gemini-2.0-flash-exp",
      "mistralai/mistral-small",
      "cohere/command-r-plus",
    ],
    envVars: ["OPENROUTER_API_KEY"],
  },
  {
    name: "ollama",
    description: "Ollama (local AI models)",
    defaultModel: "qwen2.5:7b",
    models: ["qwen2.5:7b", "qwen2.5:3b", "llama3.2", "codellama"],
    envVars: [],
    toolCheck: { command: "ollama", args: ["--version"] },
  },
];

/** Suggested on 503 when nothing better is known about the environment. */
const STATIC_FALLBACKS: readonly ProviderName[] = ["openai", "anthropic", "deepseek", "ollama"];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

export function getCatalogEntry(name: ProviderName): ProviderCatalogEntry {
  const entry = PROVIDER_CATALOG.find((candidate) => candidate.name === name);
  if (!entry) {
    throw new Error(`Provider ${name} is missing from the catalog`);
  }
  return entry;
}

export function staticFallbacks(exclude: ProviderName): ProviderName[] {
  return STATIC_FALLBACKS.filter((name) => name !== exclude);
}

export function describeFallback(name: ProviderName): string {
  const entry = getCatalogEntry(name);
  if (entry.toolCheck) {
    return "(local, free - no key needed)";
  }
  return `(if ${entry.envVars.join(" or ")} configured)`;
}
