type ProviderName = "gemini" | "openai" | "openrouter" | "anthropic";

interface GenerationRequest {
  prompt: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  /** Abort the request after this long. Provider default when omitted. */
  timeoutMs?: number;
}

interface TokenUsage {
  input: number;
  output: number;
}

interface GenerationResult {
  text: string;
  tokenUsage: TokenUsage;
}

/** One round trip to a hosted model. Retries are the caller's concern. */
interface TextGenerator {
  readonly name: ProviderName;
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export type { ProviderName, GenerationRequest, GenerationResult, TextGenerator, TokenUsage };
