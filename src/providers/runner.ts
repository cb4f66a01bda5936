/**
 * Backend Runner - one state machine for every backend CLI
 *
 * All backends share the same shape: start a CLI, feed it a prompt on
 * stdin, read line-delimited JSON from stdout until it exits, pick the
 * final text. What differs (arguments, stdin layout, event schemas,
 * extraction) lives in a BackendDescriptor; this module drives the run.
 *
 * ## STATES
 *
 *   IDLE → STARTED → STREAMING → COMPLETED | FAILED | INTERRUPTED
 *
 * - IDLE→STARTED: spawn in its own process group. Launch failure →
 *   LaunchError. An already-aborted request never launches.
 * - STARTED→STREAMING: register with the ProcessRegistry, read stderr in
 *   the background (diagnostics, session ids), read stdout line by line.
 * - COMPLETED: exit 0, no error event. Returns the extracted text, or null
 *   when nothing usable came out.
 * - FAILED: non-zero exit, error event, or unreadable stdout.
 * - INTERRUPTED: the registry saw SIGINT/SIGTERM during the run. A
 *   captured session id is printed so the user can resume it.
 *
 * Whatever the outcome, the progress indicator is stopped and the process
 * unregistered before the promise settles.
 *
 * @module runner
 */

import {
  BackendExitError,
  InterruptedError,
  LaunchError,
  StreamReadError,
} from "../errors.js";
import type { GenerationRequest, GenerationResult, BackendName } from "../types.js";
import type { UsageStats } from "../commit/usage-comment.js";
import { stripCodeFence } from "../commit/format.js";
import { NOOP_PROGRESS, randomProgressMessage, startProgress, type ProgressSink } from "../ui/progress.js";
import { debugLog } from "../utils/logger.js";
import { decodeStreamLine, type EventDecoder, type StreamEvent } from "./events.js";
import { extractFinalText, type ExtractionStrategy } from "./extract.js";
import type { ProcessRegistry } from "./registry.js";
import { readLines, spawnBackend, type BackendChild, type ExitStatus, type SpawnFn } from "./spawn.js";

/**
 * Concrete command line for one run.
 */
export interface BackendInvocation {
  args: string[];
  /** Written to stdin, then stdin is closed */
  stdin: string;
  /** Short description of stdin for error messages */
  stdinSummary: string;
  /** Shown next to the progress message, e.g. "claude +claude-haiku-4-5" */
  label: string;
  /** First preview line, e.g. "Resuming session …" */
  initialProgress?: string;
  /** Spend ceiling passed to the backend, reported in the trailer */
  budgetUsd?: number;
}

/**
 * Everything backend-specific. One per supported CLI.
 */
export interface BackendDescriptor extends ExtractionStrategy {
  name: BackendName;
  executable: string;
  models: readonly string[];
  /** Used when no (or an unknown) model is requested; undefined = CLI default */
  defaultModel?: string;
  /** Whether the backend takes one diff or per-directory turns */
  input: "diff" | "chunks";
  /** Appended to the rules text for this backend only */
  extraRules?: string;
  decoders: readonly EventDecoder[];
  buildInvocation(request: GenerationRequest, model: string | undefined): BackendInvocation;
}

export interface RunnerDeps {
  spawn?: SpawnFn;
  startProgress?: (label: string) => ProgressSink;
  /** Where a session id is printed on interruption; defaults to stderr */
  diagnostics?: { write(chunk: string): boolean };
  now?: () => number;
}

type ResultEvent = Extract<StreamEvent, { kind: "result" }>;

/**
 * Per-run accumulators fed by both output streams.
 */
export class StreamAccumulator {
  readonly rawLines: string[] = [];
  readonly stderrLines: string[] = [];
  readonly errors: string[] = [];
  deltaText = "";
  result?: ResultEvent;
  usage?: UsageStats;
  sessionId?: string;
  private previewText = "";

  constructor(
    private readonly decoders: readonly EventDecoder[],
    private readonly onPreview: (text: string) => void = () => undefined
  ) {}

  /** First non-blank id wins, whichever stream reports it. */
  captureSession(id: string | undefined): void {
    const trimmed = id?.trim();
    if (!this.sessionId && trimmed) {
      this.sessionId = trimmed;
    }
  }

  handleStdoutLine(line: string): void {
    this.rawLines.push(line);
    const event = decodeStreamLine(line, this.decoders);

    switch (event.kind) {
      case "delta":
        this.deltaText += event.text;
        this.previewText += event.text;
        this.onPreview(this.previewText.trim());
        break;
      case "message":
        if (event.narration) {
          this.previewText = "";
          this.onPreview(event.narration);
        }
        break;
      case "reasoning":
        this.previewText = "";
        this.onPreview(event.text);
        break;
      case "result":
        this.result = event;
        this.captureSession(event.sessionId);
        if (event.usage) {
          this.usage = event.usage;
        }
        break;
      case "usage":
        this.usage = event.usage;
        break;
      case "session":
        this.captureSession(event.sessionId);
        break;
      case "error":
        this.errors.push(event.message);
        break;
      case "unrecognized":
        break;
    }
  }

  handleStderrLine(line: string): void {
    const event = decodeStreamLine(line, this.decoders);
    if (event.kind === "session") {
      this.captureSession(event.sessionId);
      return;
    }
    if (line.trim()) {
      this.stderrLines.push(line);
    }
  }

  stderrText(): string {
    return this.stderrLines.join("\n").trim();
  }
}

/**
 * Pick the model to run: a listed model as requested, else the default.
 */
export function resolveModel(descriptor: BackendDescriptor, requested: string | undefined): string | undefined {
  const model = requested?.trim();
  if (model && descriptor.models.includes(model)) {
    return model;
  }
  return descriptor.defaultModel;
}

const MAX_ARG_DISPLAY = 120;
const MAX_STDIN_DISPLAY = 300;

/**
 * Human-readable command line for error messages; long arguments
 * (system prompts, inline prompts) are elided.
 */
export function describeCommand(executable: string, invocation: BackendInvocation): string {
  const args = invocation.args.map((arg) =>
    arg.length > MAX_ARG_DISPLAY ? `<${arg.length} chars>` : /\s/.test(arg) ? JSON.stringify(arg) : arg
  );
  const stdin =
    invocation.stdinSummary.length > MAX_STDIN_DISPLAY
      ? `${invocation.stdinSummary.slice(0, MAX_STDIN_DISPLAY)}...`
      : invocation.stdinSummary;
  return `# ${[executable, ...args].join(" ")}\n# stdin: ${stdin}`;
}

function describeExit(status: ExitStatus): string {
  return status.signal ? `signal ${status.signal}` : `exit code ${status.code}`;
}

async function consumeStderr(child: BackendChild, name: string, state: StreamAccumulator): Promise<void> {
  try {
    for await (const line of readLines(child.stderr)) {
      debugLog(name, `stderr: ${line}`);
      state.handleStderrLine(line);
    }
  } catch (err) {
    debugLog(name, `stderr read failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function defaultStartProgress(label: string): ProgressSink {
  return startProgress(randomProgressMessage(), label);
}

/**
 * Run one backend to completion.
 *
 * @returns the extracted (fence-stripped) text with usage data, or null
 *          when the backend succeeded but produced nothing usable
 * @throws LaunchError | StreamReadError | BackendExitError | InterruptedError
 */
export async function runBackend(
  descriptor: BackendDescriptor,
  request: GenerationRequest,
  registry: ProcessRegistry,
  deps: RunnerDeps = {}
): Promise<GenerationResult | null> {
  const { name } = descriptor;
  const spawnFn = deps.spawn ?? spawnBackend;
  const now = deps.now ?? Date.now;
  const diagnostics = deps.diagnostics ?? process.stderr;

  if (request.signal?.aborted) {
    throw new InterruptedError(name);
  }

  const model = resolveModel(descriptor, request.model);
  const invocation = descriptor.buildInvocation(request, model);
  const startedAt = now();

  const progress = request.showProgress
    ? (deps.startProgress ?? defaultStartProgress)(invocation.label)
    : NOOP_PROGRESS;
  if (invocation.initialProgress) {
    progress.update(invocation.initialProgress);
  }

  const state = new StreamAccumulator(descriptor.decoders, (text) => progress.update(text));
  let child: BackendChild | undefined;
  let exited = false;

  try {
    try {
      child = await spawnFn({ command: descriptor.executable, args: invocation.args, cwd: request.cwd });
    } catch (err) {
      throw new LaunchError(name, err);
    }

    registry.register(child, () => progress.stop());
    if (request.signal?.aborted) {
      // Aborted while the process was starting
      registry.forwardSignal("SIGINT");
    }

    child.stdin.on("error", (err: Error) => debugLog(name, `stdin: ${err.message}`));
    child.stdin.end(invocation.stdin);

    const stderrDone = consumeStderr(child, name, state);

    try {
      for await (const line of readLines(child.stdout)) {
        state.handleStdoutLine(line);
      }
    } catch (err) {
      throw new StreamReadError(name, err);
    }

    const status = await child.wait();
    exited = true;
    await stderrDone;

    if (registry.wasInterrupted()) {
      if (state.sessionId) {
        diagnostics.write(`${state.sessionId}\n`);
      }
      throw new InterruptedError(name, state.sessionId);
    }

    if (status.code !== 0) {
      throw new BackendExitError(
        name,
        `${name} invocation failed (${describeExit(status)})\n${describeCommand(descriptor.executable, invocation)}`,
        status.code,
        state.stderrText() || state.errors.join("\n")
      );
    }

    if (state.errors.length > 0) {
      throw new BackendExitError(name, `${name} returned an error`, status.code, state.errors.join("\n"));
    }

    const { result } = state;
    if (result?.isError && result.subtype) {
      diagnostics.write(`${name}: ${result.subtype}\n`);
    }

    const text = stripCodeFence(
      extractFinalText(
        { raw: state.rawLines.join("\n"), resultText: result?.text, deltaText: state.deltaText },
        descriptor
      )
    ).trim();

    if (!text) {
      if (result?.isError && result.subtype) {
        throw new BackendExitError(name, `${name}: ${result.subtype}`, status.code, state.stderrText());
      }
      return null;
    }

    return Object.freeze({
      text,
      usage: state.usage,
      elapsedMs: now() - startedAt,
      model,
      sessionId: state.sessionId,
      budgetUsd: invocation.budgetUsd,
    });
  } finally {
    registry.stopProgressIfSet();
    progress.stop();
    registry.unregister();
    if (child && !exited) {
      registry.terminate(child);
    }
  }
}
