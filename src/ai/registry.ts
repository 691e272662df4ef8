import { spawnSync } from "child_process";
import { logger } from "../logger";
import { PROVIDER_CATALOG, ProviderCatalogEntry, ProviderName, getCatalogEntry } from "./catalog";

export interface ProviderInfo {
  name: ProviderName;
  configured: boolean;
  models: string[];
  description: string;
}

export type Environment = Readonly<Record<string, string | undefined>>;

/** Returns true when `command args` runs and exits with status 0. */
export type ToolProbe = (command: string, args: readonly string[]) => boolean;

export const defaultToolProbe: ToolProbe = (command, args) => {
  const result = spawnSync(command, [...args], {
    stdio: ["ignore", "pipe", "pipe"],
    encoding: "utf-8",
    timeout: 5000,
  });
  if (result.error) {
    logger.debug(`${command} probe failed: ${result.error.message}`);
    return false;
  }
  return result.status === 0;
};

export interface ProviderRegistryOptions {
  env?: Environment;
  probe?: ToolProbe;
}

/**
 * Catalog of known providers. Nothing is cached: every query re-reads the
 * environment and re-runs tool probes.
 */
export class ProviderRegistry {
  private readonly env: Environment;
  private readonly probe: ToolProbe;

  constructor(options: ProviderRegistryOptions = {}) {
    this.env = options.env ?? process.env;
    this.probe = options.probe ?? defaultToolProbe;
  }

  listProviders(): ProviderInfo[] {
    return PROVIDER_CATALOG.map((entry) => this.describe(entry));
  }

  getProviderInfo(name: ProviderName): ProviderInfo {
    return this.describe(getCatalogEntry(name));
  }

  getProviderNames(): ProviderName[] {
    return PROVIDER_CATALOG.map((entry) => entry.name);
  }

  getConfiguredProviders(): ProviderName[] {
    return this.listProviders()
      .filter((info) => info.configured)
      .map((info) => info.name);
  }

  private describe(entry: ProviderCatalogEntry): ProviderInfo {
    return {
      name: entry.name,
      configured: this.isConfigured(entry),
      models: [...entry.models],
      description: entry.description,
    };
  }

  private isConfigured(entry: ProviderCatalogEntry): boolean {
    if (entry.toolCheck) {
      try {
        return this.probe(entry.toolCheck.command, entry.toolCheck.args);
      } catch (error) {
        logger.debug(`${entry.name} probe threw: ${error instanceof Error ? error.message : String(error)}`);
        return false;
      }
    }
    return entry.envVars.some((name) => Boolean(this.env[name]?.trim()));
  }
}
