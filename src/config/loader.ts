import fs from "fs";
import path from "path";
import { z } from "zod";
import { PROVIDER_NAMES } from "../ai/catalog";
import { Environment } from "../ai/registry";
import { CONFIG_FILE } from "../constants";
import { logger } from "../logger";
import { CommitwrightConfig } from "./types";

const defaultConfig: CommitwrightConfig = {
  ai: {
    provider: "openai",
  },
  commit: {
    maxSubjectLength: 100,
  },
  verbose: false,
};

const fileSchema = z.object({
  ai: z
    .object({
      provider: z.enum(PROVIDER_NAMES),
      model: z.string().min(1),
      apiKey: z.string(),
      endpoint: z.string().url(),
      timeoutMs: z.number().int().positive(),
      templateDirectory: z.string().min(1),
    })
    .partial()
    .optional(),
  commit: z
    .object({
      maxSubjectLength: z.number().int().min(20),
    })
    .partial()
    .optional(),
  verbose: z.boolean().optional(),
});

type ConfigFile = z.infer<typeof fileSchema>;

export function getConfigPath(cwd: string): string {
  return path.join(cwd, CONFIG_FILE);
}

export function getDefaultConfig(): CommitwrightConfig {
  return {
    ...defaultConfig,
    ai: { ...defaultConfig.ai },
    commit: { ...defaultConfig.commit },
  };
}

function mergeFileConfig(base: CommitwrightConfig, file: ConfigFile): CommitwrightConfig {
  return {
    ai: { ...base.ai, ...(file.ai || {}) },
    commit: { ...base.commit, ...(file.commit || {}) },
    verbose: file.verbose ?? base.verbose,
  };
}

function mergeEnvConfig(config: CommitwrightConfig, env: Environment): CommitwrightConfig {
  const merged = { ...config, ai: { ...config.ai } };

  const provider = env.COMMITWRIGHT_PROVIDER?.trim();
  if (provider) {
    const parsed = z.enum(PROVIDER_NAMES).safeParse(provider);
    if (parsed.success) {
      if (parsed.data !== merged.ai.provider) {
        // A model or key chosen for another provider would not apply.
        merged.ai = { provider: parsed.data, timeoutMs: merged.ai.timeoutMs, templateDirectory: merged.ai.templateDirectory };
      }
    } else {
      logger.warn(`ignoring COMMITWRIGHT_PROVIDER=${provider}; expected one of ${PROVIDER_NAMES.join(", ")}`);
    }
  }

  const model = env.COMMITWRIGHT_MODEL?.trim();
  if (model) {
    merged.ai.model = model;
  }

  if (env.COMMITWRIGHT_DEBUG === "1") {
    merged.verbose = true;
  }

  return merged;
}

function readConfigFile(configPath: string): ConfigFile | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    logger.warn(`failed to parse ${CONFIG_FILE} (${error instanceof Error ? error.message : String(error)}), using defaults.`);
    return undefined;
  }

  const result = fileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    logger.warn(`invalid ${CONFIG_FILE}: ${issue.path.join(".") || "(root)"} ${issue.message}, using defaults.`);
    return undefined;
  }
  return result.data;
}

export function loadConfig(cwd: string = process.cwd(), env: Environment = process.env): CommitwrightConfig {
  const configPath = getConfigPath(cwd);
  let config = getDefaultConfig();

  if (fs.existsSync(configPath)) {
    const file = readConfigFile(configPath);
    if (file) {
      config = mergeFileConfig(config, file);
    }
  }

  return mergeEnvConfig(config, env);
}

/** Writes the file contents merged with `updates`; environment overrides are not persisted. */
export function saveConfig(cwd: string, updates: Partial<CommitwrightConfig>): CommitwrightConfig {
  const configPath = getConfigPath(cwd);
  const current = fs.existsSync(configPath)
    ? mergeFileConfig(getDefaultConfig(), readConfigFile(configPath) ?? {})
    : getDefaultConfig();
  const next: CommitwrightConfig = {
    ...current,
    ...updates,
    ai: { ...current.ai, ...(updates.ai || {}) },
    commit: { ...current.commit, ...(updates.commit || {}) },
  };
  fs.writeFileSync(configPath, JSON.stringify(next, null, 2) + "\n", "utf-8");
  return next;
}
