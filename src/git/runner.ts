import { execFile } from "child_process";
import { GitError } from "../errors";

interface GitRunOptions {
  cwd?: string;
  /** Extra variables for the child process, layered over the parent environment. */
  env?: Record<string, string>;
}

interface GitRunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs one git command. Resolves with the exit code instead of rejecting on
 * a non-zero exit; rejects only when git could not be started at all.
 */
type GitRunner = (args: string[], options?: GitRunOptions) => Promise<GitRunResult>;

const MAX_BUFFER = 256 * 1024 * 1024;

const execGit: GitRunner = (args, options = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      "git",
      args,
      {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        encoding: "utf-8",
        maxBuffer: MAX_BUFFER,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }
        if (typeof error.code === "number") {
          resolve({ stdout, stderr, exitCode: error.code });
          return;
        }
        const hint = error.code === "ENOENT" ? " (is git installed and on PATH?)" : "";
        reject(new GitError(`Could not run git ${args[0] || ""}: ${error.message}${hint}`, { args }));
      },
    );
  });

export { execGit };
export type { GitRunner, GitRunOptions, GitRunResult };
