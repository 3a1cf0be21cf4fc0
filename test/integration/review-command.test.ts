import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "fs";
import os from "os";
import path from "path";
import { describeFailure, run } from "../../src/commands/review";
import type { CommandContext, ReviewOptions } from "../../src/commands/review";
import type { DiffProvider } from "../../src/git/repository";
import { BranchNotFoundError, GitError } from "../../src/errors";
import { ScriptedGenerator, StaticDiff, httpError, recordingSleep, reply } from "../helpers/fakes";

const DIFF = "diff --git a/lib/cache.ts b/lib/cache.ts\n+  cache.clear();\n";

describe("review command", () => {
  let cwd: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), "mergelens-cmd-"));
    stdout = [];
    stderr = [];
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  function context(deps: CommandContext["deps"], env: Record<string, string> = { GEMINI_API_KEY: "test-key" }): CommandContext {
    return {
      env,
      cwd,
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
      deps,
    };
  }

  const required: ReviewOptions = { repoUrl: "git@github.com:acme/widgets.git", featureBranch: "feature/cache" };

  it("prints the review to stdout and a summary to stderr", async () => {
    const generator = new ScriptedGenerator([reply("Clearing the cache on every request defeats it.")]);

    const code = await run("detail", required, context({ diffProvider: new StaticDiff(DIFF), generator }));

    assert.equal(code, 0);
    assert.deepEqual(stdout, ["Clearing the cache on every request defeats it."]);
    assert.deepEqual(stderr, [
      "Reviewing feature/cache against main (detail)",
      "Requesting detail review from gemini (gemini-2.5-flash)...",
      "Done: gemini-2.5-flash, 1 attempt(s), tokens 12 in / 3 out",
    ]);
  });

  it("applies the base branch and model options", async () => {
    const diffProvider = new StaticDiff(DIFF);
    const generator = new ScriptedGenerator([reply("Ship it.")]);

    const code = await run(
      "release",
      { ...required, baseBranch: "develop", model: "gemini-2.5-pro", temperature: "0", maxTokens: "512", timeout: "2500" },
      context({ diffProvider, generator }),
    );

    assert.equal(code, 0);
    assert.deepEqual(diffProvider.calls, [["develop", "feature/cache"]]);
    assert.equal(generator.requests[0].model, "gemini-2.5-pro");
    assert.equal(generator.requests[0].temperature, 0);
    assert.equal(generator.requests[0].maxOutputTokens, 512);
    assert.equal(generator.requests[0].timeoutMs, 2500);
    assert.equal(stderr[0], "Reviewing feature/cache against develop (release)");
  });

  it("reports a branch with no changes", async () => {
    const code = await run("detail", required, context({ diffProvider: new StaticDiff(""), generator: new ScriptedGenerator([]) }));

    assert.equal(code, 0);
    assert.deepEqual(stdout, []);
    assert.equal(stderr.at(-1), "No changes on feature/cache relative to main. Nothing to review.");
  });

  it("prints the prompt on a dry run", async () => {
    const code = await run("detail", { ...required, dryRun: true }, context({ diffProvider: new StaticDiff(DIFF) }, {}));

    assert.equal(code, 0);
    assert.equal(stdout.length, 1);
    assert.ok(stdout[0].startsWith("You are a senior software engineer"));
    assert.ok(stdout[0].includes(DIFF));
  });

  it("requires the repository and branch", async () => {
    const code = await run("detail", {}, context({}));

    assert.equal(code, 1);
    assert.deepEqual(stderr, ["Error: missing required option(s): --repo-url, --feature-branch"]);
  });

  it("explains a missing API key", async () => {
    const code = await run("detail", required, context({ diffProvider: new StaticDiff(DIFF) }, {}));

    assert.equal(code, 1);
    assert.equal(stderr.at(-1), "Error: GEMINI_API_KEY is not set. Export it or choose another provider with --provider.");
  });

  it("rejects a malformed number before doing any work", async () => {
    const diffProvider = new StaticDiff(DIFF);

    const code = await run("detail", { ...required, maxAttempts: "abc" }, context({ diffProvider }));

    assert.equal(code, 1);
    assert.deepEqual(stderr, ['Error: --max-attempts must be an integer (got "abc")']);
    assert.equal(diffProvider.calls.length, 0);
  });

  it("reports exhausted retries with the attempt count", async () => {
    const generator = new ScriptedGenerator([httpError(503, "Service Unavailable"), httpError(503, "Service Unavailable")]);
    const { sleep, delays } = recordingSleep();

    const code = await run(
      "detail",
      { ...required, maxAttempts: "2", retryDelay: "5" },
      context({ diffProvider: new StaticDiff(DIFF), generator, sleep }),
    );

    assert.equal(code, 1);
    assert.deepEqual(delays, [5]);
    assert.equal(stderr.at(-1), "Error: Model request failed after 2 attempt(s): Service Unavailable");
  });

  it("reports a fatal model error without retrying", async () => {
    const generator = new ScriptedGenerator([httpError(401, "Invalid API key")]);
    const { sleep, delays } = recordingSleep();

    const code = await run("detail", required, context({ diffProvider: new StaticDiff(DIFF), generator, sleep }));

    assert.equal(code, 1);
    assert.deepEqual(delays, []);
    assert.equal(stderr.at(-1), "Error: Model request failed: Invalid API key");
  });

  it("reports missing branches", async () => {
    const diffProvider: DiffProvider = {
      getDiff: async () => {
        throw new BranchNotFoundError(["origin/feature/cache"]);
      },
    };

    const code = await run("detail", required, context({ diffProvider }));

    assert.equal(code, 1);
    assert.equal(
      stderr.at(-1),
      "Error: Branch not found: origin/feature/cache. Check the branch names and that the remote has them.",
    );
  });

  it("prints resolved settings in debug mode", async () => {
    const code = await run(
      "detail",
      { ...required, debug: true, dryRun: true },
      context({ diffProvider: new StaticDiff(DIFF) }),
    );

    assert.equal(code, 0);
    assert.deepEqual(stderr.slice(0, 4), [
      "[debug] provider=gemini",
      "[debug] model=gemini-2.5-flash",
      "[debug] temperature=0.2",
      "[debug] maxTokens=20480",
    ]);
  });
});

describe("describeFailure", () => {
  it("adds git's stderr to git failures", () => {
    const err = new GitError("git fetch failed (exit 128): fatal: unable to access", {
      stderr: "fatal: unable to access\nhint: check your proxy\n",
    });
    assert.equal(
      describeFailure(err),
      "git fetch failed (exit 128): fatal: unable to access\nfatal: unable to access\nhint: check your proxy",
    );
  });

  it("falls back to the message", () => {
    assert.equal(describeFailure(new Error("boom")), "boom");
    assert.equal(describeFailure("plain"), "plain");
  });
});
