import { CommitMessage } from "../formatter/commitMessage";
import { GitDiff } from "../git/diff";
import { ProviderName } from "./catalog";
import { FallbackProviders } from "./http";

export interface AiProvider {
  readonly name: ProviderName;
  /** One message per defect; empty when the provider is ready to call. Never throws. */
  validateConfig(): string[];
  /** Performs exactly one request; rejects with a GenerationError on failure. */
  generateCommitMessage(diff: GitDiff): Promise<CommitMessage>;
}

/** Settings every backend accepts besides its credentials and model. */
export interface ProviderCommonConfig {
  timeoutMs?: number;
  /** Provider names suggested when the backend answers 503. */
  fallbackProviders?: FallbackProviders;
  templateDirectory?: string;
}
