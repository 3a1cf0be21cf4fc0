import OpenAI from "openai";
import { EmptyResponseError, ProviderConnectionError } from "../../errors";
import type { GenerationRequest, GenerationResult, TextGenerator } from "../types";

const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

/**
 * Chat-completions provider. Also serves OpenRouter, which speaks the same API.
 */
export class OpenAIGenerator implements TextGenerator {
  readonly name: "openai" | "openrouter";
  readonly client: OpenAI;

  constructor(apiKey: string, options: { openrouter?: boolean } = {}) {
    this.name = options.openrouter ? "openrouter" : "openai";
    // Retries are handled by withRetry, not the SDK
    this.client = new OpenAI({
      apiKey,
      baseURL: options.openrouter ? OPENROUTER_BASE_URL : undefined,
      maxRetries: 0,
    });
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    let completion: OpenAI.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: request.model,
          temperature: request.temperature,
          max_tokens: request.maxOutputTokens,
          messages: [{ role: "user", content: request.prompt }],
        },
        { timeout: request.timeoutMs },
      );
    } catch (err: unknown) {
      // Also covers APIConnectionTimeoutError
      if (err instanceof OpenAI.APIConnectionError) throw new ProviderConnectionError(this.name, err);
      throw err;
    }

    const text = completion.choices[0]?.message?.content || "";
    if (!text.trim()) {
      throw new EmptyResponseError(`${this.name} returned no text`);
    }

    return {
      text,
      tokenUsage: {
        input: completion.usage?.prompt_tokens || 0,
        output: completion.usage?.completion_tokens || 0,
      },
    };
  }
}
