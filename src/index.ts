export { withRetry, computeDelay, resolveRetryPolicy, isRetryableError, RetryError } from "./core/retry";
export type { RetryOptions, RetryPolicy, RetryAttemptInfo } from "./core/retry";
export { GitRepository, normalizeRemoteUrl, defaultClonePath } from "./git/repository";
export type { DiffProvider } from "./git/repository";
export { buildSshCommand } from "./git/ssh";
export { createGenerator, detectProvider } from "./llm/registry";
export { generateReview } from "./llm/generate";
export type { TextGenerator, GenerationRequest, GenerationResult, ProviderName } from "./llm/types";
export { loadConfig } from "./config";
export { runReview } from "./review/pipeline";
export type { ReviewRequest, ReviewOutcome, ReviewMode } from "./review/types";
export * from "./errors";
