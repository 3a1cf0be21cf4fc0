import fs from "fs";
import os from "os";
import path from "path";
import { DEFAULT_RETRY, resolveRetryPolicy } from "./core/retry";
import { ConfigError } from "./errors";
import { DEFAULT_CONTEXT_LINES } from "./git/repository";
import { defaultModelFor, detectProvider, parseProvider, resolveApiKey } from "./llm/registry";
import type { Env } from "./llm/registry";
import type { ProviderName } from "./llm/types";
import { REVIEW_MODES } from "./review/types";
import { validateFileConfig } from "./schema/validate";
import type { ConfigOverrides, FileConfig, RetrySettings, ReviewerConfig } from "./types";

const RC_FILE = ".mergelensrc.json";

const DEFAULTS = {
  temperature: 0.2,
  maxTokens: 20480,
  requestTimeoutMs: 600_000,
  baseBranch: "main",
  workDir: path.join(os.tmpdir(), "mergelens-repos"),
  contextLines: DEFAULT_CONTEXT_LINES,
  retry: { ...DEFAULT_RETRY },
};

interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: Env;
  overrides?: ConfigOverrides;
}

function parseInteger(value: string, name: string): number {
  const parsed = Number(value);
  if (!value.trim() || !Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer (got "${value}")`);
  }
  return parsed;
}

function parseNumber(value: string, name: string): number {
  const parsed = Number(value);
  if (!value.trim() || !Number.isFinite(parsed)) {
    throw new ConfigError(`${name} must be a number (got "${value}")`);
  }
  return parsed;
}

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function firstDefined<T>(...values: Array<T | undefined>): T | undefined {
  return values.find((v) => v !== undefined);
}

/**
 * Read the rc file. An explicit path must exist; the default one is optional.
 */
function loadFileConfig(configPath: string | undefined, cwd: string): FileConfig {
  const rcPath = path.resolve(cwd, configPath || RC_FILE);
  if (!fs.existsSync(rcPath)) {
    if (configPath) throw new ConfigError(`Config file not found: ${rcPath}`);
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(rcPath, "utf-8"));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse ${path.basename(rcPath)}: ${message}`);
  }

  const result = validateFileConfig(raw);
  if (!result.valid) {
    throw new ConfigError(`Invalid ${path.basename(rcPath)}:\n  ${result.errors.join("\n  ")}`);
  }

  // Relative paths in the file are relative to the file, not the cwd
  const dir = path.dirname(rcPath);
  const config = { ...result.value };
  if (config.workDir) config.workDir = path.resolve(dir, config.workDir);
  if (config.templates) {
    const templates: NonNullable<FileConfig["templates"]> = {};
    for (const mode of REVIEW_MODES) {
      const file = config.templates[mode];
      if (file) templates[mode] = path.resolve(dir, file);
    }
    config.templates = templates;
  }
  return config;
}

function loadEnvConfig(env: Env): FileConfig & { debug?: boolean } {
  const retry: Partial<RetrySettings> = {};
  if (env.MERGELENS_MAX_ATTEMPTS) {
    retry.maxAttempts = parseInteger(env.MERGELENS_MAX_ATTEMPTS, "MERGELENS_MAX_ATTEMPTS");
  }
  if (env.MERGELENS_RETRY_DELAY_MS) {
    retry.initialDelayMs = parseNumber(env.MERGELENS_RETRY_DELAY_MS, "MERGELENS_RETRY_DELAY_MS");
  }
  const requestTimeoutMs = env.MERGELENS_TIMEOUT_MS
    ? parseNumber(env.MERGELENS_TIMEOUT_MS, "MERGELENS_TIMEOUT_MS")
    : undefined;

  return {
    model: env.MERGELENS_MODEL || undefined,
    baseBranch: env.MERGELENS_BASE_BRANCH || undefined,
    sshKeyPath: env.MERGELENS_SSH_KEY_PATH || undefined,
    workDir: env.MERGELENS_WORK_DIR || undefined,
    requestTimeoutMs,
    retry,
    debug: env.MERGELENS_DEBUG !== undefined ? isTruthy(env.MERGELENS_DEBUG) : undefined,
  };
}

function mergeRetry(...layers: Array<Partial<RetrySettings> | undefined>): RetrySettings {
  // Highest priority first
  const pick = <K extends keyof RetrySettings>(key: K): RetrySettings[K] | undefined =>
    firstDefined(...layers.map((layer) => layer?.[key]));

  const initialDelayMs = pick("initialDelayMs") ?? DEFAULTS.retry.initialDelayMs;
  return {
    maxAttempts: pick("maxAttempts") ?? DEFAULTS.retry.maxAttempts,
    initialDelayMs,
    multiplier: pick("multiplier") ?? DEFAULTS.retry.multiplier,
    maxDelayMs: pick("maxDelayMs") ?? Math.max(DEFAULTS.retry.maxDelayMs, initialDelayMs),
    jitter: pick("jitter") ?? DEFAULTS.retry.jitter,
  };
}

/**
 * Resolve the configuration. Precedence: command line > environment > rc file > defaults.
 */
function loadConfig(options: LoadConfigOptions = {}): ReviewerConfig {
  const env = options.env || {};
  const cwd = options.cwd || process.cwd();
  const cli = options.overrides || {};
  const file = loadFileConfig(options.configPath, cwd);
  const fromEnv = loadEnvConfig(env);

  let provider: ProviderName;
  if (cli.provider) provider = parseProvider(cli.provider);
  else if (env.MERGELENS_PROVIDER) provider = parseProvider(env.MERGELENS_PROVIDER);
  else provider = file.provider ?? detectProvider(env);

  const templates = { ...file.templates };
  if (cli.template) templates[cli.template.mode] = path.resolve(cwd, cli.template.path);

  const config: ReviewerConfig = {
    provider,
    model: firstDefined(cli.model, fromEnv.model, file.model) ?? defaultModelFor(provider),
    apiKey: resolveApiKey(provider, env),
    temperature: firstDefined(cli.temperature, file.temperature) ?? DEFAULTS.temperature,
    maxTokens: firstDefined(cli.maxTokens, file.maxTokens) ?? DEFAULTS.maxTokens,
    requestTimeoutMs:
      firstDefined(cli.requestTimeoutMs, fromEnv.requestTimeoutMs, file.requestTimeoutMs) ?? DEFAULTS.requestTimeoutMs,
    baseBranch: firstDefined(cli.baseBranch, fromEnv.baseBranch, file.baseBranch) ?? DEFAULTS.baseBranch,
    sshKeyPath: firstDefined(cli.sshKeyPath, fromEnv.sshKeyPath, file.sshKeyPath),
    skipHostKeyCheck: firstDefined(cli.skipHostKeyCheck, file.skipHostKeyCheck) ?? false,
    workDir: firstDefined(cli.workDir, fromEnv.workDir, file.workDir) ?? DEFAULTS.workDir,
    contextLines: file.contextLines ?? DEFAULTS.contextLines,
    templates,
    retry: mergeRetry(cli.retry, fromEnv.retry, file.retry),
    dryRun: cli.dryRun ?? false,
    debug: firstDefined(cli.debug, fromEnv.debug) ?? false,
  };

  return validateConfig(config);
}

function validateConfig(config: ReviewerConfig): ReviewerConfig {
  if (!Number.isFinite(config.temperature) || config.temperature < 0 || config.temperature > 2) {
    throw new ConfigError(`temperature must be between 0 and 2 (got ${config.temperature})`);
  }
  if (!Number.isInteger(config.maxTokens) || config.maxTokens < 1) {
    throw new ConfigError(`maxTokens must be a positive integer (got ${config.maxTokens})`);
  }
  if (!Number.isFinite(config.requestTimeoutMs) || config.requestTimeoutMs <= 0) {
    throw new ConfigError(`requestTimeoutMs must be greater than 0 (got ${config.requestTimeoutMs})`);
  }
  // Throws on a bad retry policy before anything is cloned or sent
  resolveRetryPolicy(config.retry);
  return config;
}

export { loadConfig, loadFileConfig, validateConfig, parseInteger, parseNumber, DEFAULTS, RC_FILE };
export type { LoadConfigOptions };
