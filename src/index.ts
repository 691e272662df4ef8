export * from "./errors";
export * from "./git/diff";
export { parseStagedDiff } from "./git/diffCollector";
export { getStagedChanges, commitMessage, isGitRepo } from "./git/gitClient";
export * from "./formatter/commitMessage";
export { formatCommitMessage, formatSubject } from "./formatter/commitFormatter";
export type { CommitFormatOptions } from "./formatter/commitFormatter";
export { parseCommitText } from "./formatter/commitParser";
export { renderTemplate } from "./prompts/loader";
export type { AiProvider, ProviderCommonConfig } from "./ai/provider";
export { PROVIDER_NAMES, isProviderName } from "./ai/catalog";
export type { ProviderName } from "./ai/catalog";
export { ProviderRegistry, defaultToolProbe } from "./ai/registry";
export type { Environment, ProviderInfo, ToolProbe } from "./ai/registry";
export { getProvider, resolveApiKey } from "./ai/factory";
export type { ProviderOptions } from "./ai/factory";
export { OpenRouterProvider, isValidOpenRouterModel } from "./ai/openRouterProvider";
export { OpenAiProvider } from "./ai/openAiProvider";
export { AnthropicProvider } from "./ai/anthropicProvider";
export { GeminiProvider } from "./ai/geminiProvider";
export { OllamaProvider } from "./ai/ollamaProvider";
export { loadConfig, saveConfig, getDefaultConfig } from "./config/loader";
export type { CommitwrightConfig, AiConfig, CommitConfig } from "./config/types";
