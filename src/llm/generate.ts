import { withRetry } from "../core/retry";
import type { RetryOptions } from "../core/retry";
import type { GenerationRequest, GenerationResult, TextGenerator } from "./types";

interface GeneratedReview extends GenerationResult {
  attempts: number;
}

/**
 * Run one generation through the retry policy. Transient failures (rate limits,
 * 5xx, dropped connections, empty answers) are retried with backoff.
 */
async function generateReview(
  generator: TextGenerator,
  request: GenerationRequest,
  retry: RetryOptions = {},
  log: (message: string) => void = () => undefined,
): Promise<GeneratedReview> {
  let attempts = 0;

  const result = await withRetry(
    () => {
      attempts++;
      return generator.generate(request);
    },
    {
      ...retry,
      onRetry: (info) => {
        const reason = info.error instanceof Error ? info.error.message : String(info.error);
        log(`${generator.name} attempt ${info.attempt} failed (${reason}). Retrying in ${(info.delayMs / 1000).toFixed(1)}s...`);
        retry.onRetry?.(info);
      },
    },
  );

  return { ...result, attempts };
}

export { generateReview };
export type { GeneratedReview };
