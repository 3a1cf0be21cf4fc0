import fs from "fs";
import path from "path";
import { BranchNotFoundError, GitError } from "../errors";
import { execGit } from "./runner";
import type { GitRunner, GitRunResult } from "./runner";

/** Anything that can produce the diff of a feature branch against its base. */
interface DiffProvider {
  getDiff(baseBranch: string, featureBranch: string): Promise<string>;
}

type PrepareOutcome = "cloned" | "recloned" | "reused";

interface GitRepositoryOptions {
  repoUrl: string;
  localPath: string;
  /** Value for GIT_SSH_COMMAND, see buildSshCommand(). */
  sshCommand?: string;
  remote?: string;
  contextLines?: number;
  runner?: GitRunner;
  log?: (message: string) => void;
}

const DEFAULT_CONTEXT_LINES = 10;

/**
 * Normalize a remote URL so that two spellings of the same remote compare equal:
 * credentials, trailing slashes, a `.git` suffix and letter case are ignored.
 */
function normalizeRemoteUrl(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, "").replace(/\.git$/i, "");
  if (trimmed.startsWith("git@") || !trimmed.includes("://")) {
    return trimmed.toLowerCase();
  }
  try {
    const parsed = new URL(trimmed);
    parsed.username = "";
    parsed.password = "";
    return parsed.toString().replace(/\/+$/, "").toLowerCase();
  } catch {
    return trimmed.toLowerCase();
  }
}

function repoNameFromUrl(url: string): string {
  const trimmed = url.trim().replace(/[/\\]+$/, "").replace(/\.git$/i, "");
  const last = trimmed.split(/[/:\\]/).pop() || "";
  const cleaned = last.replace(/[^A-Za-z0-9._-]/g, "-");
  return cleaned || "repo";
}

/**
 * Where a repository is cloned when no --local-path is given.
 * Each review mode keeps its own clone.
 */
function defaultClonePath(workDir: string, repoUrl: string, mode: string): string {
  return path.join(workDir, `${repoNameFromUrl(repoUrl)}-${mode}`);
}

class GitRepository implements DiffProvider {
  readonly repoUrl: string;
  readonly localPath: string;
  private readonly remote: string;
  private readonly contextLines: number;
  private readonly runner: GitRunner;
  private readonly env: Record<string, string>;
  private readonly log: (message: string) => void;
  private prepared = false;

  constructor(options: GitRepositoryOptions) {
    this.repoUrl = options.repoUrl;
    this.localPath = path.resolve(options.localPath);
    this.remote = options.remote || "origin";
    this.contextLines = options.contextLines ?? DEFAULT_CONTEXT_LINES;
    this.runner = options.runner || execGit;
    this.env = options.sshCommand ? { GIT_SSH_COMMAND: options.sshCommand } : {};
    this.log = options.log || (() => undefined);
  }

  /**
   * Make sure `localPath` holds a clone of `repoUrl`. An existing clone of
   * the same remote is reused; anything else at that path is replaced.
   */
  async prepare(): Promise<PrepareOutcome> {
    const outcome = await this.ensureClone();
    this.prepared = true;
    return outcome;
  }

  async fetch(): Promise<void> {
    this.log(`Fetching ${this.remote}...`);
    await this.git(["fetch", this.remote, "--prune"]);
  }

  async branchExists(branch: string): Promise<boolean> {
    const result = await this.git(["show-ref", "--verify", "--quiet", this.remoteRef(branch)], { allowFailure: true });
    return result.exitCode === 0;
  }

  async mergeBase(baseBranch: string, featureBranch: string): Promise<string> {
    const result = await this.git(["merge-base", this.remoteRef(baseBranch), this.remoteRef(featureBranch)], {
      allowFailure: true,
    });
    const sha = result.stdout.trim();
    if (result.exitCode !== 0 || !sha) {
      throw new GitError(`No common ancestor between ${this.remote}/${baseBranch} and ${this.remote}/${featureBranch}`, {
        args: ["merge-base"],
        exitCode: result.exitCode,
        stderr: result.stderr,
      });
    }
    return sha;
  }

  /**
   * Three-dot diff: the changes on `featureBranch` since it diverged from
   * `baseBranch`, taken from the remote-tracking refs after a fetch.
   */
  async getDiff(baseBranch: string, featureBranch: string): Promise<string> {
    if (!this.prepared) await this.prepare();
    await this.fetch();

    const missing: string[] = [];
    for (const branch of [baseBranch, featureBranch]) {
      if (!(await this.branchExists(branch))) {
        missing.push(`${this.remote}/${branch}`);
      }
    }
    if (missing.length > 0) {
      throw new BranchNotFoundError(missing);
    }

    const base = await this.mergeBase(baseBranch, featureBranch);
    this.log(`Diffing ${base.slice(0, 12)}...${this.remote}/${featureBranch}`);

    const result = await this.git(["diff", base, this.remoteRef(featureBranch), `--unified=${this.contextLines}`]);
    return result.stdout;
  }

  private remoteRef(branch: string): string {
    return `refs/remotes/${this.remote}/${branch}`;
  }

  private async ensureClone(): Promise<PrepareOutcome> {
    if (!this.isClone()) {
      await this.freshClone();
      return "cloned";
    }

    const existing = await this.remoteUrl();
    if (!existing) {
      this.log(`No '${this.remote}' remote in ${this.localPath}. Re-cloning...`);
      await this.freshClone();
      return "recloned";
    }

    if (normalizeRemoteUrl(existing) !== normalizeRemoteUrl(this.repoUrl)) {
      this.log(`Existing clone points at ${existing}, not ${this.repoUrl}. Re-cloning...`);
      await this.freshClone();
      return "recloned";
    }

    this.log(`Reusing existing clone at ${this.localPath}`);
    return "reused";
  }

  private isClone(): boolean {
    return fs.existsSync(path.join(this.localPath, ".git"));
  }

  private async remoteUrl(): Promise<string | null> {
    const result = await this.git(["config", "--get", `remote.${this.remote}.url`], { allowFailure: true });
    const url = result.stdout.trim();
    return result.exitCode === 0 && url ? url : null;
  }

  private async freshClone(): Promise<void> {
    if (fs.existsSync(this.localPath)) {
      this.log(`Removing ${this.localPath}`);
      fs.rmSync(this.localPath, { recursive: true, force: true });
    }
    const parent = path.dirname(this.localPath);
    fs.mkdirSync(parent, { recursive: true });

    this.log(`Cloning ${this.repoUrl} into ${this.localPath}...`);
    try {
      await this.git(["clone", this.repoUrl, this.localPath], { cwd: parent });
    } catch (err) {
      if (err instanceof GitError) {
        throw new GitError(
          `Failed to clone ${this.repoUrl}. Check the URL and your SSH key or access rights.`,
          { args: err.args, exitCode: err.exitCode, stderr: err.stderr },
        );
      }
      throw err;
    }
  }

  private async git(
    args: string[],
    options: { cwd?: string; allowFailure?: boolean } = {},
  ): Promise<GitRunResult> {
    const result = await this.runner(args, { cwd: options.cwd || this.localPath, env: this.env });
    if (result.exitCode !== 0 && !options.allowFailure) {
      const detail = result.stderr.trim().split("\n")[0] || "no output";
      throw new GitError(`git ${args[0]} failed (exit ${result.exitCode}): ${detail}`, {
        args,
        exitCode: result.exitCode,
        stderr: result.stderr,
      });
    }
    return result;
  }
}

export { GitRepository, normalizeRemoteUrl, repoNameFromUrl, defaultClonePath, DEFAULT_CONTEXT_LINES };
export type { DiffProvider, GitRepositoryOptions, PrepareOutcome };
