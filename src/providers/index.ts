/**
 * Backend catalogue and the generate() entry point shared by the CLI and
 * the MCP server.
 *
 * @module providers
 */

import { appendUsageComment } from "../commit/usage-comment.js";
import { BODY_LINE_WIDTH, wrapMessage } from "../commit/format.js";
import { loadSkillText } from "../commit/rules.js";
import { ConfigError, NoStagedChangesError } from "../errors.js";
import { fetchDiff, fetchDiffChunks } from "../git/diff-source.js";
import type { BackendName, DiffInput, GenerationRequest } from "../types.js";
import { isOnPath, type CommandRunner } from "../utils/command.js";
import { logRun } from "../utils/logger.js";
import { claudeBackend } from "./backends/claude.js";
import { codexBackend } from "./backends/codex.js";
import { geminiBackend } from "./backends/gemini.js";
import type { ProcessRegistry } from "./registry.js";
import { runBackend, type BackendDescriptor, type RunnerDeps } from "./runner.js";

export const BACKENDS: Readonly<Record<BackendName, BackendDescriptor>> = {
  claude: claudeBackend,
  gemini: geminiBackend,
  codex: codexBackend,
};

/** Auto-detection preference when no backend is configured. */
export const DETECTION_ORDER: readonly BackendName[] = ["claude", "gemini", "codex"];

export function isBackendName(value: string): value is BackendName {
  return Object.prototype.hasOwnProperty.call(BACKENDS, value);
}

export function getBackend(name: string): BackendDescriptor {
  const trimmed = name.trim();
  if (!isBackendName(trimmed)) {
    const available = Object.keys(BACKENDS).sort().join(", ");
    throw new ConfigError(`invalid GIT_AI_BACKEND value "${trimmed}" (available: ${available})`);
  }
  return BACKENDS[trimmed];
}

/**
 * First backend in DETECTION_ORDER whose executable is on PATH.
 */
export function detectBackend(isAvailable: (executable: string) => boolean = isOnPath): BackendName {
  const found = DETECTION_ORDER.find((name) => isAvailable(BACKENDS[name].executable));
  if (!found) {
    throw new ConfigError("no supported backend found in PATH (install claude, gemini or codex)");
  }
  return found;
}

export interface RequestOptions {
  extraNote?: string;
  skillPath?: string;
  noCC?: boolean;
  model?: string;
  sessionId?: string;
  budgetUsd?: number;
  showProgress?: boolean;
  cwd?: string;
  signal?: AbortSignal;
  /** Command runner for git; tests pass a fake */
  run?: CommandRunner;
}

/**
 * Read the staged changes in the shape the backend wants and assemble the
 * request.
 *
 * @throws NotARepositoryError outside a git work tree
 * @throws NoStagedChangesError when nothing is staged
 */
export function buildRequest(backend: BackendDescriptor, options: RequestOptions = {}): GenerationRequest {
  const source = { cwd: options.cwd, run: options.run };

  let input: DiffInput;
  if (backend.input === "chunks") {
    const chunks = fetchDiffChunks(source);
    if (chunks.length === 0) throw new NoStagedChangesError();
    input = { kind: "chunks", chunks };
  } else {
    const diff = fetchDiff(source);
    if (!diff.trim()) throw new NoStagedChangesError();
    input = { kind: "diff", diff };
  }

  return Object.freeze({
    input,
    skillText: loadSkillText({ noCC: options.noCC, skillPath: options.skillPath, extraRules: backend.extraRules }),
    extraNote: options.extraNote ?? "",
    noCC: options.noCC ?? false,
    model: options.model,
    sessionId: options.sessionId,
    budgetUsd: options.budgetUsd,
    showProgress: options.showProgress ?? false,
    cwd: options.cwd,
    signal: options.signal,
  });
}

/**
 * Run a backend and post-process its answer: wrap to BODY_LINE_WIDTH and
 * append the usage trailer.
 *
 * @returns the commit message, or "" when the backend produced nothing
 */
export async function generate(
  backend: BackendDescriptor,
  request: GenerationRequest,
  registry: ProcessRegistry,
  deps: RunnerDeps = {}
): Promise<string> {
  const problem = request.cwd ?? process.cwd();

  let message: string;
  try {
    const result = await runBackend(backend, request, registry, deps);
    message = result
      ? appendUsageComment(wrapMessage(result.text, BODY_LINE_WIDTH), {
          usage: result.usage,
          elapsedMs: result.elapsedMs,
          model: result.model,
          sessionId: result.sessionId,
          budgetUsd: result.budgetUsd,
        })
      : "";
  } catch (err) {
    await logRun({
      backend: backend.name,
      level: "error",
      problem,
      answer: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }

  await logRun({ backend: backend.name, level: "info", problem, answer: message });
  return message;
}
