import { afterEach, describe, it, expect, vi } from "vitest";
import {
  NOOP_PROGRESS,
  PROGRESS_QUEUE_CAPACITY,
  ProgressQueue,
  startProgress,
} from "../../src/ui/progress.js";

class FakeTerminal {
  readonly writes: string[] = [];
  readonly isTTY = true;
  readonly columns = 120;

  write(chunk: string): boolean {
    this.writes.push(chunk);
    return true;
  }

  last(): string {
    return this.writes[this.writes.length - 1] ?? "";
  }
}

describe("ProgressQueue", () => {
  it("drops new items once full", () => {
    const queue = new ProgressQueue();
    for (let i = 0; i < PROGRESS_QUEUE_CAPACITY; i++) {
      expect(queue.offer(`item ${i}`)).toBe(true);
    }

    expect(queue.offer("overflow")).toBe(false);
    expect(queue.size()).toBe(8);

    const drained = queue.drain();
    expect(drained[0]).toBe("item 0");
    expect(drained[7]).toBe("item 7");
    expect(queue.isEmpty()).toBe(true);
  });
});

describe("startProgress", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("stays silent when stderr is not a terminal", () => {
    const output = { write: vi.fn(() => true), isTTY: false };

    expect(startProgress("Working...", "codex", { output })).toBe(NOOP_PROGRESS);
    expect(output.write).not.toHaveBeenCalled();
  });

  it("renders the message, label, elapsed time and latest preview", () => {
    vi.useFakeTimers();
    const terminal = new FakeTerminal();
    let now = 1000;
    const progress = startProgress("Working...", "codex +gpt-5.2-codex", { output: terminal, now: () => now });

    expect(terminal.last().startsWith("\r\x1b[2K")).toBe(true);
    expect(terminal.last()).toContain("Working... (using codex +gpt-5.2-codex) 0.0s");

    progress.update("Reading the diff");
    progress.update("Checking src/cli.ts\nsecond line");
    now = 3400;
    vi.advanceTimersByTime(100);

    expect(terminal.last()).toContain("Working... (using codex +gpt-5.2-codex) 2.4s");
    expect(terminal.last()).toContain("Checking src/cli.ts");
    expect(terminal.last()).not.toContain("second line");

    progress.stop();
  });

  it("clears the line once on stop", () => {
    vi.useFakeTimers();
    const terminal = new FakeTerminal();
    const progress = startProgress("Working...", "codex", { output: terminal });

    progress.stop();
    progress.stop();
    progress.update("ignored");
    vi.advanceTimersByTime(500);

    expect(terminal.writes).toHaveLength(2);
    expect(terminal.last()).toBe("\r\x1b[2K");
  });
});
