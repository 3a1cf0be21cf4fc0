import {
  GoogleGenerativeAI,
  GoogleGenerativeAIError,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIRequestInputError,
  GoogleGenerativeAIResponseError,
} from "@google/generative-ai";
import type { GenerateContentResult } from "@google/generative-ai";
import { BlockedResponseError, EmptyResponseError, ProviderConnectionError } from "../../errors";
import type { GenerationRequest, GenerationResult, TextGenerator } from "../types";

const BLOCKING_FINISH_REASONS = new Set(["SAFETY", "RECITATION", "BLOCKLIST", "PROHIBITED_CONTENT", "SPII"]);

/**
 * The SDK turns a failed or aborted fetch() into a bare GoogleGenerativeAIError
 * with no status; its subclasses carry an HTTP answer or reject the input.
 */
function isConnectionFailure(err: unknown): boolean {
  return (
    err instanceof GoogleGenerativeAIError &&
    !(err instanceof GoogleGenerativeAIFetchError) &&
    !(err instanceof GoogleGenerativeAIResponseError) &&
    !(err instanceof GoogleGenerativeAIRequestInputError)
  );
}

export class GeminiGenerator implements TextGenerator {
  readonly name = "gemini";
  private readonly client: GoogleGenerativeAI;

  constructor(apiKey: string) {
    this.client = new GoogleGenerativeAI(apiKey);
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const model = this.client.getGenerativeModel({
      model: request.model,
      generationConfig: {
        temperature: request.temperature,
        maxOutputTokens: request.maxOutputTokens,
      },
    });

    // AbortSignal.timeout rather than requestOptions.timeout: the SDK never clears its timer
    let result: GenerateContentResult;
    try {
      result = await model.generateContent(
        request.prompt,
        request.timeoutMs !== undefined ? { signal: AbortSignal.timeout(request.timeoutMs) } : {},
      );
    } catch (err: unknown) {
      if (isConnectionFailure(err)) throw new ProviderConnectionError(this.name, err);
      throw err;
    }
    const response = result.response;

    const blockReason: string | undefined = response.promptFeedback?.blockReason;
    if (blockReason) {
      throw new BlockedResponseError(`prompt blocked (${blockReason})`);
    }

    const finishReason: string | undefined = response.candidates?.[0]?.finishReason;
    if (finishReason && BLOCKING_FINISH_REASONS.has(finishReason)) {
      const ratings = (response.candidates?.[0]?.safetyRatings || [])
        .map((r) => `${r.category}: ${r.probability}`)
        .join(", ");
      throw new BlockedResponseError(ratings ? `${finishReason} (${ratings})` : finishReason);
    }

    const text = response.text();
    if (!text.trim()) {
      throw new EmptyResponseError(`Gemini returned no text${finishReason ? ` (finish reason ${finishReason})` : ""}`);
    }

    const usage = response.usageMetadata;
    return {
      text,
      tokenUsage: {
        input: usage?.promptTokenCount ?? 0,
        output: usage?.candidatesTokenCount ?? 0,
      },
    };
  }
}
