import { ConfigError } from "../errors";
import { defaultClonePath, GitRepository } from "../git/repository";
import type { DiffProvider } from "../git/repository";
import type { GitRunner } from "../git/runner";
import { buildSshCommand } from "../git/ssh";
import { generateReview } from "../llm/generate";
import { apiKeyVariable, createGenerator } from "../llm/registry";
import type { TextGenerator } from "../llm/types";
import type { ReviewerConfig } from "../types";
import { loadTemplate, renderPrompt } from "./prompt";
import type { ReviewOutcome, ReviewRequest } from "./types";

interface ReviewDependencies {
  /** Replaces the git-backed diff provider. */
  diffProvider?: DiffProvider;
  /** Replaces the provider built from config.provider and config.apiKey. */
  generator?: TextGenerator;
  runner?: GitRunner;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  log?: (message: string) => void;
}

function createDiffProvider(
  request: ReviewRequest,
  config: ReviewerConfig,
  deps: Pick<ReviewDependencies, "runner" | "log"> = {},
): GitRepository {
  const sshCommand = config.sshKeyPath
    ? buildSshCommand(config.sshKeyPath, { skipHostKeyCheck: config.skipHostKeyCheck })
    : undefined;

  return new GitRepository({
    repoUrl: request.repoUrl,
    localPath: request.localPath || defaultClonePath(config.workDir, request.repoUrl, request.mode),
    sshCommand,
    contextLines: config.contextLines,
    runner: deps.runner,
    log: deps.log,
  });
}

/**
 * Diff the feature branch against its base, fill the mode's template and ask
 * the model for a review. Credentials, the SSH key and the template are all
 * checked before the first git command runs.
 */
async function runReview(
  request: ReviewRequest,
  config: ReviewerConfig,
  deps: ReviewDependencies = {},
): Promise<ReviewOutcome> {
  const log = deps.log || (() => undefined);

  if (!config.dryRun && !deps.generator && !config.apiKey) {
    throw new ConfigError(
      `${apiKeyVariable(config.provider)} is not set. Export it or choose another provider with --provider.`,
    );
  }

  const template = loadTemplate(request.mode, config.templates[request.mode]);
  const diffProvider = deps.diffProvider || createDiffProvider(request, config, deps);

  const diff = await diffProvider.getDiff(request.baseBranch, request.featureBranch);
  if (!diff.trim()) {
    return {
      status: "skipped",
      reason: `No changes on ${request.featureBranch} relative to ${request.baseBranch}`,
    };
  }

  const prompt = renderPrompt(template, diff);
  if (config.dryRun) {
    return { status: "dry-run", prompt };
  }

  let generator = deps.generator;
  if (!generator) {
    if (!config.apiKey) {
      throw new ConfigError(`${apiKeyVariable(config.provider)} is not set.`);
    }
    generator = createGenerator(config.provider, config.apiKey);
  }

  log(`Requesting ${request.mode} review from ${generator.name} (${config.model})...`);
  const review = await generateReview(
    generator,
    {
      prompt,
      model: config.model,
      temperature: config.temperature,
      maxOutputTokens: config.maxTokens,
      timeoutMs: config.requestTimeoutMs,
    },
    { ...config.retry, sleep: deps.sleep, random: deps.random },
    log,
  );

  return {
    status: "reviewed",
    text: review.text,
    tokenUsage: review.tokenUsage,
    attempts: review.attempts,
    model: config.model,
  };
}

export { runReview, createDiffProvider };
export type { ReviewDependencies };
