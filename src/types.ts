import type { DiffChunk } from "./git/diff-source.js";
import type { UsageStats } from "./commit/usage-comment.js";

export type BackendName = "claude" | "gemini" | "codex";

/** Staged changes as one diff, or split per directory. */
export type DiffInput =
  | { kind: "diff"; diff: string }
  | { kind: "chunks"; chunks: DiffChunk[] };

/**
 * Everything one generation needs. Built once, never mutated.
 */
export interface GenerationRequest {
  readonly input: DiffInput;
  /** Rules text sent under "Instructions:" */
  readonly skillText: string;
  readonly extraNote: string;
  readonly noCC: boolean;
  /** Requested model; unknown names fall back to the backend default */
  readonly model?: string;
  /** Session to resume, for backends that support it */
  readonly sessionId?: string;
  /** Spend ceiling in USD, for backends that support it */
  readonly budgetUsd?: number;
  readonly showProgress: boolean;
  /** Directory the backend runs in */
  readonly cwd?: string;
  /** Aborted before launch: the backend is never started */
  readonly signal?: AbortSignal;
}

/**
 * Outcome of a successful run, before wrapping and the usage trailer.
 */
export interface GenerationResult {
  readonly text: string;
  readonly usage?: UsageStats;
  readonly elapsedMs: number;
  readonly model?: string;
  readonly sessionId?: string;
  readonly budgetUsd?: number;
}

export function inputAsDiff(input: DiffInput): string {
  return input.kind === "diff" ? input.diff : input.chunks.map((chunk) => chunk.diff).join("");
}

export function inputAsChunks(input: DiffInput): DiffChunk[] {
  return input.kind === "chunks" ? input.chunks : [{ dir: ".", diff: input.diff }];
}
