import type { TokenUsage } from "../llm/types";

type ReviewMode = "detail" | "release";

const REVIEW_MODES: readonly ReviewMode[] = ["detail", "release"];

interface ReviewRequest {
  mode: ReviewMode;
  repoUrl: string;
  featureBranch: string;
  baseBranch: string;
  /** Clone location; derived from the work dir and repo URL when omitted. */
  localPath?: string;
}

type ReviewOutcome =
  | { status: "skipped"; reason: string }
  | { status: "dry-run"; prompt: string }
  | { status: "reviewed"; text: string; tokenUsage: TokenUsage; attempts: number; model: string };

export { REVIEW_MODES };
export type { ReviewMode, ReviewRequest, ReviewOutcome };
