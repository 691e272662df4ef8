import { AiConfig, CommitwrightConfig } from "../config/types";
import { ConfigurationError } from "../errors";
import { logger } from "../logger";
import { AnthropicProvider } from "./anthropicProvider";
import { ProviderName, getCatalogEntry, staticFallbacks } from "./catalog";
import { GeminiProvider } from "./geminiProvider";
import { OllamaProvider } from "./ollamaProvider";
import { OpenAiProvider } from "./openAiProvider";
import { OpenRouterProvider } from "./openRouterProvider";
import { AiProvider, ProviderCommonConfig } from "./provider";
import { Environment, ProviderRegistry } from "./registry";

export interface ProviderOptions {
  provider?: ProviderName;
  model?: string;
  apiKey?: string;
  env?: Environment;
  registry?: ProviderRegistry;
}

/** Resolves `env:NAME` references; anything else is taken literally. */
export function resolveApiKey(token: string | undefined, env: Environment): string {
  if (!token) return "";
  if (token.startsWith("env:")) {
    const envKey = token.slice(4);
    return env[envKey]?.trim() || "";
  }
  return token.trim();
}

function keyFromEnvironment(name: ProviderName, env: Environment): string {
  for (const variable of getCatalogEntry(name).envVars) {
    const value = env[variable]?.trim();
    if (value) return value;
  }
  return "";
}

/**
 * Providers to suggest when `name` answers 503: whatever else is configured
 * right now, or the static list when nothing is.
 */
export function resolveFallbackProviders(name: ProviderName, registry: ProviderRegistry): ProviderName[] {
  const configured = registry.getConfiguredProviders().filter((candidate) => candidate !== name);
  return configured.length ? configured : staticFallbacks(name);
}

export function getProvider(config: CommitwrightConfig, options: ProviderOptions = {}): AiProvider {
  const env = options.env ?? process.env;
  const name = options.provider ?? config.ai.provider;
  // Model, key and endpoint from the config file belong to the provider configured there.
  const ai: AiConfig = name === config.ai.provider ? config.ai : { provider: name };

  const model = options.model || ai.model || getCatalogEntry(name).defaultModel;
  const apiKey = resolveApiKey(options.apiKey || ai.apiKey, env) || keyFromEnvironment(name, env);
  const registry = options.registry ?? new ProviderRegistry({ env });
  const common: ProviderCommonConfig = {
    timeoutMs: config.ai.timeoutMs,
    templateDirectory: config.ai.templateDirectory,
    // Probing for local tools is deferred until a 503 asks for alternatives.
    fallbackProviders: () => resolveFallbackProviders(name, registry),
  };

  logger.debug(`Using provider ${name} with model ${model}`);

  switch (name) {
    case "openai":
    case "deepseek":
      return new OpenAiProvider({ ...common, providerName: name, apiKey, model, endpoint: ai.endpoint });
    case "anthropic":
      return new AnthropicProvider({ ...common, apiKey, model, endpoint: ai.endpoint });
    case "gemini":
      return new GeminiProvider({ ...common, apiKey, model, baseUrl: ai.endpoint });
    case "openrouter":
      return new OpenRouterProvider({ ...common, apiKey, model, baseUrl: ai.endpoint });
    case "ollama":
      return new OllamaProvider({ ...common, model, baseUrl: ai.endpoint });
    default: {
      const unknown: never = name;
      throw new ConfigurationError(`Unsupported provider: ${String(unknown)}`);
    }
  }
}
