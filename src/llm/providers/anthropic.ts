import Anthropic from "@anthropic-ai/sdk";
import { EmptyResponseError, ProviderConnectionError } from "../../errors";
import type { GenerationRequest, GenerationResult, TextGenerator } from "../types";

export class AnthropicGenerator implements TextGenerator {
  readonly name = "anthropic";
  readonly client: Anthropic;

  constructor(apiKey: string) {
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    let message: Anthropic.Message;
    try {
      message = await this.client.messages.create(
        {
          model: request.model,
          max_tokens: request.maxOutputTokens,
          temperature: request.temperature,
          messages: [{ role: "user", content: request.prompt }],
        },
        { timeout: request.timeoutMs },
      );
    } catch (err: unknown) {
      if (err instanceof Anthropic.APIConnectionError) throw new ProviderConnectionError(this.name, err);
      throw err;
    }

    const text = message.content
      .filter((block): block is Anthropic.TextBlock => block.type === "text")
      .map((block) => block.text)
      .join("\n");

    if (!text.trim()) {
      throw new EmptyResponseError("anthropic returned no text");
    }

    return {
      text,
      tokenUsage: {
        input: message.usage?.input_tokens || 0,
        output: message.usage?.output_tokens || 0,
      },
    };
  }
}
