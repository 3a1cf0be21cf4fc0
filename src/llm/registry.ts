import { ConfigError } from "../errors";
import { AnthropicGenerator } from "./providers/anthropic";
import { GeminiGenerator } from "./providers/gemini";
import { OpenAIGenerator } from "./providers/openai";
import type { ProviderName, TextGenerator } from "./types";

type Env = Record<string, string | undefined>;

interface ProviderInfo {
  envKey: string;
  defaultModel: string;
}

const PROVIDERS: Record<ProviderName, ProviderInfo> = {
  gemini: { envKey: "GEMINI_API_KEY", defaultModel: "gemini-2.5-flash" },
  anthropic: { envKey: "ANTHROPIC_API_KEY", defaultModel: "claude-sonnet-4-5-20250929" },
  openai: { envKey: "OPENAI_API_KEY", defaultModel: "gpt-4o" },
  openrouter: { envKey: "OPENROUTER_API_KEY", defaultModel: "anthropic/claude-sonnet-4" },
};

// Detection order when no provider is forced
const PROVIDER_NAMES: ProviderName[] = ["gemini", "anthropic", "openai", "openrouter"];

function isProviderName(value: string): value is ProviderName {
  return (PROVIDER_NAMES as string[]).includes(value);
}

function parseProvider(value: string): ProviderName {
  const normalized = value.trim().toLowerCase();
  if (!isProviderName(normalized)) {
    throw new ConfigError(`Unknown provider "${value}". Expected one of: ${PROVIDER_NAMES.join(", ")}`);
  }
  return normalized;
}

function detectProvider(env: Env): ProviderName {
  const forced = env.MERGELENS_PROVIDER?.trim();
  if (forced) return parseProvider(forced);

  return PROVIDER_NAMES.find((name) => !!env[PROVIDERS[name].envKey]) || "gemini";
}

function defaultModelFor(provider: ProviderName): string {
  return PROVIDERS[provider].defaultModel;
}

function apiKeyVariable(provider: ProviderName): string {
  return PROVIDERS[provider].envKey;
}

function resolveApiKey(provider: ProviderName, env: Env): string | undefined {
  const key = env[PROVIDERS[provider].envKey]?.trim();
  return key || undefined;
}

function createGenerator(provider: ProviderName, apiKey: string): TextGenerator {
  switch (provider) {
    case "gemini":
      return new GeminiGenerator(apiKey);
    case "anthropic":
      return new AnthropicGenerator(apiKey);
    case "openai":
      return new OpenAIGenerator(apiKey);
    case "openrouter":
      return new OpenAIGenerator(apiKey, { openrouter: true });
  }
}

function listProviders(): ProviderName[] {
  return [...PROVIDER_NAMES];
}

export {
  detectProvider,
  parseProvider,
  defaultModelFor,
  apiKeyVariable,
  resolveApiKey,
  createGenerator,
  listProviders,
};
export type { Env };
