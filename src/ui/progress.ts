/**
 * Progress indicator shown on stderr while a backend runs.
 *
 * The runner pushes reasoning previews through `update()`; a timer drains
 * them and redraws one line:
 *
 *   ⠙ Drafting Conventional Commit... (using claude +claude-haiku-4-5) 3.4s  Reading src/cli.ts
 *
 * Updates go through a bounded queue. When the renderer falls behind, new
 * updates are dropped instead of blocking the parse loop: previews are
 * best-effort, the final message never depends on them.
 *
 * @module progress
 */

import chalk from "chalk";

export interface ProgressSink {
  /** Offer a preview line; dropped if the queue is full */
  update(text: string): void;
  /** Stop rendering and clear the line. Safe to call more than once */
  stop(): void;
}

export const PROGRESS_QUEUE_CAPACITY = 8;

const FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"] as const;

const MESSAGES = [
  "Generating commit message...",
  "Summarizing staged changes...",
  "Drafting Conventional Commit...",
  "Analyzing diff hunks...",
  "Composing commit summary...",
] as const;

export class ProgressQueue {
  private items: string[] = [];
  private maxSize: number;

  constructor(maxSize: number = PROGRESS_QUEUE_CAPACITY) {
    this.maxSize = maxSize;
  }

  /** Returns false (and keeps nothing) when full. */
  offer(item: string): boolean {
    if (this.items.length >= this.maxSize) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  drain(): string[] {
    return this.items.splice(0, this.items.length);
  }

  size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }
}

export interface ProgressOutput {
  write(chunk: string): boolean;
  isTTY?: boolean;
  columns?: number;
}

export interface ProgressOptions {
  output?: ProgressOutput;
  intervalMs?: number;
  now?: () => number;
}

export const NOOP_PROGRESS: ProgressSink = {
  update: () => undefined,
  stop: () => undefined,
};

export function randomProgressMessage(): string {
  return MESSAGES[Math.floor(Math.random() * MESSAGES.length)];
}

function firstLine(text: string): string {
  return text.trim().split("\n")[0]?.trim() ?? "";
}

function truncate(text: string, max: number): string {
  if (max <= 0) return "";
  return text.length > max ? `${text.slice(0, Math.max(0, max - 1))}…` : text;
}

/**
 * Start rendering. Returns a no-op sink when the output is not a terminal,
 * so piping the message into a file or `git commit -F -` stays clean.
 */
export function startProgress(message: string, label: string, options: ProgressOptions = {}): ProgressSink {
  const output = options.output ?? process.stderr;
  if (!output.isTTY) {
    return NOOP_PROGRESS;
  }

  const now = options.now ?? Date.now;
  const started = now();
  const queue = new ProgressQueue();
  let frame = 0;
  let preview = "";
  let stopped = false;

  const render = (): void => {
    const pending = queue.drain();
    if (pending.length > 0) {
      preview = firstLine(pending[pending.length - 1]);
    }

    const elapsed = `${((now() - started) / 1000).toFixed(1)}s`;
    const head = `${FRAMES[frame % FRAMES.length]} ${message}${label ? ` (using ${label})` : ""} ${elapsed}`;
    frame++;

    const room = (output.columns ?? 80) - head.length - 3;
    const tail = preview ? `  ${chalk.gray(truncate(preview, room))}` : "";
    output.write(`\r\x1b[2K${chalk.magenta(head.slice(0, 1))}${head.slice(1)}${tail}`);
  };

  render();
  const timer = setInterval(render, options.intervalMs ?? 100);
  timer.unref();

  return {
    update(text: string): void {
      if (stopped || !text.trim()) return;
      queue.offer(text);
    },
    stop(): void {
      if (stopped) return;
      stopped = true;
      clearInterval(timer);
      output.write("\r\x1b[2K");
    },
  };
}
