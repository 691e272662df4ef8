import { ProviderName } from "../ai/catalog";

export interface AiConfig {
  provider: ProviderName;
  model?: string;
  /** A literal key or an `env:NAME` reference. */
  apiKey?: string;
  endpoint?: string;
  timeoutMs?: number;
  templateDirectory?: string;
}

export interface CommitConfig {
  maxSubjectLength?: number;
}

export interface CommitwrightConfig {
  ai: AiConfig;
  commit: CommitConfig;
  verbose?: boolean;
}
