import type { ProviderName } from "./llm/types";
import type { ReviewMode } from "./review/types";

export interface RetrySettings {
  maxAttempts: number;
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  jitter: number;
}

/** Shape of .mergelensrc.json. Every field is optional. */
export interface FileConfig {
  provider?: ProviderName;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  requestTimeoutMs?: number;
  baseBranch?: string;
  sshKeyPath?: string;
  skipHostKeyCheck?: boolean;
  workDir?: string;
  contextLines?: number;
  templates?: Partial<Record<ReviewMode, string>>;
  retry?: Partial<RetrySettings>;
}

/** Fully resolved settings handed to the review pipeline. */
export interface ReviewerConfig {
  provider: ProviderName;
  model: string;
  apiKey?: string;
  temperature: number;
  maxTokens: number;
  requestTimeoutMs: number;
  baseBranch: string;
  sshKeyPath?: string;
  skipHostKeyCheck: boolean;
  workDir: string;
  contextLines: number;
  templates: Partial<Record<ReviewMode, string>>;
  retry: RetrySettings;
  dryRun: boolean;
  debug: boolean;
}

/** Values given on the command line. Undefined means "not given". */
export interface ConfigOverrides {
  provider?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  requestTimeoutMs?: number;
  baseBranch?: string;
  sshKeyPath?: string;
  skipHostKeyCheck?: boolean;
  workDir?: string;
  template?: { mode: ReviewMode; path: string };
  retry?: Partial<RetrySettings>;
  dryRun?: boolean;
  debug?: boolean;
}

export type ValidationResult<T> =
  | { valid: true; value: T; errors: [] }
  | { valid: false; errors: string[] };
