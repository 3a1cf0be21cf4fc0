#!/usr/bin/env node

import { Command, program } from "commander";
import dotenv from "dotenv";
import pkg from "../package.json";
import { run } from "./commands/review";
import type { ReviewOptions } from "./commands/review";
import { listProviders } from "./llm/registry";
import { REVIEW_MODES } from "./review/types";
import type { ReviewMode } from "./review/types";

const DESCRIPTIONS: Record<ReviewMode, string> = {
  detail: "Detailed code review of a feature branch: correctness, security, maintainability",
  release: "Release readiness review of a feature branch: breaking changes, risks, rollout",
};

program
  .name("mergelens")
  .description("AI-powered review of a feature branch against its base branch")
  .version(pkg.version)
  .option("-m, --model <name>", "Model name (default depends on the provider)")
  .option("-p, --provider <name>", `LLM provider: ${listProviders().join(", ")}`)
  .option("-k, --ssh-key-path <path>", "SSH private key used to fetch the repository")
  .option("-s, --skip-host-key-check", "Disable SSH host key verification")
  .option("-c, --config <path>", "Config file (default: .mergelensrc.json)")
  .option("--debug", "Print resolved settings and stack traces");

for (const mode of REVIEW_MODES) {
  program
    .command(mode)
    .description(DESCRIPTIONS[mode])
    .requiredOption("-u, --repo-url <url>", "Repository clone URL")
    .requiredOption("-f, --feature-branch <name>", "Branch to review")
    .option("-b, --base-branch <name>", "Branch to diff against (default: main)")
    .option("--local-path <path>", "Where to keep the clone (default: <tmp>/mergelens-repos/<repo>-<mode>)")
    .option("--temperature <n>", "Sampling temperature, 0 to 2 (default: 0.2)")
    .option("--max-tokens <n>", "Maximum output tokens (default: 20480)")
    .option("--timeout <ms>", "Abort a model request that takes longer than this (default: 600000)")
    .option("--max-attempts <n>", "Attempts per model request, 0 or 1 disables retries (default: 3)")
    .option("--retry-delay <ms>", "Delay before the first retry; doubles each time (default: 30000)")
    .option("--template <path>", "Prompt template to use instead of the built-in one")
    .option("--dry-run", "Print the prompt instead of sending it")
    .action(async (_opts: ReviewOptions, command: Command) => {
      dotenv.config();
      process.exitCode = await run(mode, command.optsWithGlobals<ReviewOptions>());
    });
}

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
