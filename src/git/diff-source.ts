import path from "path";
import { runCommand, shellEscape, type CommandRunner } from "../utils/command.js";
import { NotARepositoryError } from "../errors.js";

/**
 * ============================================================================
 * STAGED DIFF SOURCE
 * ============================================================================
 *
 * Reads what is in the git index (staged, not yet committed) so a backend
 * can describe it. Two shapes:
 *
 * 1. fetchDiff() - one unified diff, for backends fed a single prompt
 *    (gemini, codex).
 *
 * 2. fetchDiffChunks() - one diff per parent directory, for backends that
 *    take a sequence of user turns (claude). Large changesets are then
 *    sent as several smaller messages instead of one oversized prompt.
 *
 * Both bound the prompt size: above a byte ceiling the diff is replaced
 * by its `--stat` summary behind a truncation notice.
 *
 * ============================================================================
 */

/** Ceiling for the whole staged diff (bytes, UTF-8). */
export const MAX_DIFF_BYTES = 512 * 1024;

/** Ceiling for a single directory chunk (bytes, UTF-8). */
export const MAX_CHUNK_BYTES = 100 * 1024;

export const TRUNCATION_NOTICE = "[diff too large; showing --stat summary only]";

export interface DiffChunk {
  /** Parent directory of the files in this chunk ("." for the repo root) */
  dir: string;

  /** Unified diff (or stat summary) restricted to that directory's files */
  diff: string;
}

export interface DiffSourceOptions {
  cwd?: string;
  run?: CommandRunner;
}

/**
 * Staged paths, NUL-separated and unquoted so they work as pathspecs.
 * Renames are listed as a deletion plus an addition, putting both the old
 * and the new directory in the chunks.
 */
export const LIST_STAGED_FILES = "git -c core.quotePath=false diff --staged --name-only --no-renames -z";

function gitOrThrow(run: CommandRunner, cmd: string, cwd: string): string {
  const result = run(cmd, cwd);
  if (result.exitCode !== 0) {
    throw new Error(`failed to read staged diff (${cmd}): ${result.errorOutput.trim() || `exit code ${result.exitCode}`}`);
  }
  return result.output;
}

/**
 * COMMAND: git rev-parse --git-dir
 *
 * Exits non-zero outside a repository; that is the only signal we need.
 */
function ensureRepository(run: CommandRunner, cwd: string): void {
  if (run("git rev-parse --git-dir", cwd).exitCode !== 0) {
    throw new NotARepositoryError(cwd);
  }
}

function byteLength(text: string): number {
  return Buffer.byteLength(text, "utf8");
}

/**
 * Get the full staged diff, or a stat summary when it exceeds MAX_DIFF_BYTES.
 *
 * @throws NotARepositoryError outside a git work tree
 */
export function fetchDiff(options: DiffSourceOptions = {}): string {
  const cwd = options.cwd ?? process.cwd();
  const run = options.run ?? runCommand;

  ensureRepository(run, cwd);

  const diff = gitOrThrow(run, "git diff --staged", cwd);
  if (byteLength(diff) <= MAX_DIFF_BYTES) {
    return diff;
  }

  const stat = gitOrThrow(run, "git diff --staged --stat", cwd);
  return `${TRUNCATION_NOTICE}\n${stat}`;
}

/**
 * Group file paths by their immediate parent directory.
 * Root-level files land under ".".
 */
export function groupByDirectory(files: string[]): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const file of files) {
    const dir = path.posix.dirname(file);
    const members = groups.get(dir);
    if (members) {
      members.push(file);
    } else {
      groups.set(dir, [file]);
    }
  }
  return groups;
}

/**
 * Get the staged diff split into per-directory chunks, ordered by directory.
 *
 * Each directory's diff is limited to the files directly inside it (not
 * its subdirectories, which get their own chunk). Directories whose diff
 * comes back empty are omitted.
 *
 * @throws NotARepositoryError outside a git work tree
 */
export function fetchDiffChunks(options: DiffSourceOptions = {}): DiffChunk[] {
  const cwd = options.cwd ?? process.cwd();
  const run = options.run ?? runCommand;

  ensureRepository(run, cwd);

  /**
   * COMMAND: git diff --staged --name-only (see LIST_STAGED_FILES)
   *
   * Paths come back relative to the repository root, so the per-directory
   * diffs below run from the root too.
   */
  const root = gitOrThrow(run, "git rev-parse --show-toplevel", cwd).trim() || cwd;
  const files = gitOrThrow(run, LIST_STAGED_FILES, root)
    .split("\0")
    .filter(Boolean);

  const groups = groupByDirectory(files);
  const dirs = [...groups.keys()].sort();
  const chunks: DiffChunk[] = [];

  for (const dir of dirs) {
    const pathspecs = (groups.get(dir) ?? []).map(shellEscape).join(" ");
    const diff = gitOrThrow(run, `git diff --staged -- ${pathspecs}`, root);
    if (!diff.trim()) continue;

    if (byteLength(diff) <= MAX_CHUNK_BYTES) {
      chunks.push({ dir, diff });
      continue;
    }

    const stat = gitOrThrow(run, `git diff --staged --stat -- ${pathspecs}`, root);
    chunks.push({ dir, diff: `[diff too large for ${dir}; showing --stat summary only]\n${stat}` });
  }

  return chunks;
}
