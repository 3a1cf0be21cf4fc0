class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

class GitError extends Error {
  readonly args: string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, details: { args?: string[]; exitCode?: number | null; stderr?: string } = {}) {
    super(message);
    this.name = "GitError";
    this.args = details.args || [];
    this.exitCode = details.exitCode ?? null;
    this.stderr = details.stderr || "";
  }
}

class BranchNotFoundError extends GitError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Branch not found: ${missing.join(", ")}`);
    this.name = "BranchNotFoundError";
    this.missing = missing;
  }
}

class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateError";
  }
}

/** The model answered, but with no text. Worth another attempt. */
class EmptyResponseError extends Error {
  constructor(message = "Model returned an empty response") {
    super(message);
    this.name = "EmptyResponseError";
  }
}

/** The provider refused to produce output (safety filter, recitation, blocklist). */
class BlockedResponseError extends Error {
  readonly reason: string;

  constructor(reason: string) {
    super(`Model output was blocked: ${reason}`);
    this.name = "BlockedResponseError";
    this.reason = reason;
  }
}

/** The request never got an HTTP answer: connection dropped, DNS failure or timeout. */
class ProviderConnectionError extends Error {
  readonly provider: string;

  constructor(provider: string, cause: unknown) {
    super(`Could not reach ${provider}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "ProviderConnectionError";
    this.provider = provider;
  }
}

export {
  ConfigError,
  GitError,
  BranchNotFoundError,
  TemplateError,
  EmptyResponseError,
  BlockedResponseError,
  ProviderConnectionError,
};
