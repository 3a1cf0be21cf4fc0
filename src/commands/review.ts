import { loadConfig, parseInteger, parseNumber } from "../config";
import { RetryError, describeError } from "../core/retry";
import { BranchNotFoundError, ConfigError, GitError } from "../errors";
import type { Env } from "../llm/registry";
import { runReview } from "../review/pipeline";
import type { ReviewDependencies } from "../review/pipeline";
import type { ReviewMode } from "../review/types";
import type { ConfigOverrides, RetrySettings, ReviewerConfig } from "../types";

type ReviewOptions = {
  repoUrl?: string;
  featureBranch?: string;
  baseBranch?: string;
  localPath?: string;
  temperature?: string;
  maxTokens?: string;
  timeout?: string;
  maxAttempts?: string;
  retryDelay?: string;
  template?: string;
  dryRun?: boolean;
  // Global options
  model?: string;
  provider?: string;
  sshKeyPath?: string;
  skipHostKeyCheck?: boolean;
  config?: string;
  debug?: boolean;
};

interface CommandContext {
  env?: Env;
  cwd?: string;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  deps?: ReviewDependencies;
}

function writeStdout(text: string): void {
  process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
}

function buildOverrides(mode: ReviewMode, opts: ReviewOptions): ConfigOverrides {
  const retry: Partial<RetrySettings> = {};
  if (opts.maxAttempts !== undefined) retry.maxAttempts = parseInteger(opts.maxAttempts, "--max-attempts");
  if (opts.retryDelay !== undefined) retry.initialDelayMs = parseNumber(opts.retryDelay, "--retry-delay");

  return {
    provider: opts.provider,
    model: opts.model,
    temperature: opts.temperature !== undefined ? parseNumber(opts.temperature, "--temperature") : undefined,
    maxTokens: opts.maxTokens !== undefined ? parseInteger(opts.maxTokens, "--max-tokens") : undefined,
    requestTimeoutMs: opts.timeout !== undefined ? parseNumber(opts.timeout, "--timeout") : undefined,
    baseBranch: opts.baseBranch,
    sshKeyPath: opts.sshKeyPath,
    skipHostKeyCheck: opts.skipHostKeyCheck || undefined,
    template: opts.template ? { mode, path: opts.template } : undefined,
    retry,
    dryRun: opts.dryRun || undefined,
    debug: opts.debug || undefined,
  };
}

function describeFailure(err: unknown): string {
  if (err instanceof RetryError) {
    const cause = describeError(err.cause);
    return err.exhausted
      ? `Model request failed after ${err.attempts} attempt(s): ${cause}`
      : `Model request failed: ${cause}`;
  }
  if (err instanceof BranchNotFoundError) {
    return `${err.message}. Check the branch names and that the remote has them.`;
  }
  if (err instanceof GitError && err.stderr.trim()) {
    return `${err.message}\n${err.stderr.trim()}`;
  }
  return describeError(err);
}

function describeSettings(config: ReviewerConfig): string[] {
  const retry = config.retry;
  return [
    `provider=${config.provider}`,
    `model=${config.model}`,
    `temperature=${config.temperature}`,
    `maxTokens=${config.maxTokens}`,
    `timeout=${config.requestTimeoutMs}ms`,
    `workDir=${config.workDir}`,
    `sshKey=${config.sshKeyPath || "(none)"}`,
    `retry=${retry.maxAttempts}x from ${retry.initialDelayMs}ms (x${retry.multiplier}, cap ${retry.maxDelayMs}ms, jitter ${retry.jitter})`,
  ];
}

async function run(mode: ReviewMode, opts: ReviewOptions, ctx: CommandContext = {}): Promise<number> {
  const stdout = ctx.stdout || writeStdout;
  const stderr = ctx.stderr || ((text: string) => console.error(text));

  const missing: string[] = [];
  if (!opts.repoUrl) missing.push("--repo-url");
  if (!opts.featureBranch) missing.push("--feature-branch");
  if (!opts.repoUrl || !opts.featureBranch) {
    stderr(`Error: missing required option(s): ${missing.join(", ")}`);
    return 1;
  }

  let debug = !!opts.debug;
  try {
    const config = loadConfig({
      configPath: opts.config,
      cwd: ctx.cwd,
      env: ctx.env || process.env,
      overrides: buildOverrides(mode, opts),
    });
    debug = config.debug;

    if (debug) {
      for (const line of describeSettings(config)) stderr(`[debug] ${line}`);
    }
    stderr(`Reviewing ${opts.featureBranch} against ${config.baseBranch} (${mode})`);

    const outcome = await runReview(
      {
        mode,
        repoUrl: opts.repoUrl,
        featureBranch: opts.featureBranch,
        baseBranch: config.baseBranch,
        localPath: opts.localPath,
      },
      config,
      { log: stderr, ...ctx.deps },
    );

    switch (outcome.status) {
      case "skipped":
        stderr(`${outcome.reason}. Nothing to review.`);
        return 0;
      case "dry-run":
        stdout(outcome.prompt);
        return 0;
      case "reviewed":
        stdout(outcome.text);
        stderr(
          `Done: ${outcome.model}, ${outcome.attempts} attempt(s), ` +
            `tokens ${outcome.tokenUsage.input.toLocaleString()} in / ${outcome.tokenUsage.output.toLocaleString()} out`,
        );
        return 0;
    }
  } catch (err: unknown) {
    stderr(`Error: ${describeFailure(err)}`);
    if (debug && err instanceof Error && !(err instanceof ConfigError) && err.stack) {
      stderr(`[debug] ${err.stack}`);
    }
    return 1;
  }
}

export { run, buildOverrides, describeFailure };
export type { ReviewOptions, CommandContext };
