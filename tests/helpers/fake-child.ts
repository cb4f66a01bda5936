import { PassThrough } from "stream";
import type { BackendChild, ExitStatus, SpawnFn, SpawnRequest } from "../../src/providers/spawn.js";

/** What a fake backend prints and how it exits. */
export interface FakeScript {
  stdout?: string[];
  stderr?: string[];
  code?: number | null;
  signal?: NodeJS.Signals | null;
  /** Destroy stdout with this error instead of ending it */
  stdoutError?: Error;
  /** Keep running after printing until kill() is called */
  waitForKill?: boolean;
  /** Exit code used when killed while waiting */
  killedCode?: number | null;
}

/**
 * In-process stand-in for a backend subprocess. Output is played back on
 * the next turn of the event loop, after the runner has attached readers.
 */
export class FakeChild implements BackendChild {
  readonly pid = 4242;
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: (NodeJS.Signals | undefined)[] = [];
  stdinText = "";

  private resolveExit: (status: ExitStatus) => void = () => undefined;
  private readonly exited: Promise<ExitStatus>;
  private finished = false;

  constructor(private readonly script: FakeScript) {
    this.stdin.setEncoding("utf8");
    this.stdin.on("data", (chunk: string) => {
      this.stdinText += chunk;
    });
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
  }

  play(): void {
    setImmediate(() => {
      for (const line of this.script.stderr ?? []) this.stderr.write(`${line}\n`);
      for (const line of this.script.stdout ?? []) this.stdout.write(`${line}\n`);

      if (this.script.stdoutError) {
        this.stdout.destroy(this.script.stdoutError);
        this.finish(this.script.code ?? 1, null);
        return;
      }
      if (!this.script.waitForKill) {
        this.finish(this.script.code ?? 0, this.script.signal ?? null);
      }
    });
  }

  kill(signal?: NodeJS.Signals): boolean {
    this.signals.push(signal);
    if (this.script.waitForKill) {
      this.finish(this.script.killedCode ?? 130, null);
    }
    return true;
  }

  wait(): Promise<ExitStatus> {
    return this.exited;
  }

  private finish(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.finished) return;
    this.finished = true;
    this.stderr.end();
    if (!this.stdout.destroyed) this.stdout.end();
    this.resolveExit({ code, signal });
  }
}

export interface FakeSpawn {
  spawn: SpawnFn;
  requests: SpawnRequest[];
  children: FakeChild[];
}

/** A SpawnFn that starts one FakeChild per call, all following `script`. */
export function fakeSpawn(script: FakeScript): FakeSpawn {
  const requests: SpawnRequest[] = [];
  const children: FakeChild[] = [];
  return {
    requests,
    children,
    spawn: async (request) => {
      requests.push(request);
      const child = new FakeChild(script);
      children.push(child);
      child.play();
      return child;
    },
  };
}

/** A SpawnFn that fails like a missing executable. */
export const missingExecutable: SpawnFn = async (request) => {
  throw Object.assign(new Error(`spawn ${request.command} ENOENT`), { code: "ENOENT" });
};

/** Collects writes, for diagnostics and CLI output. */
export class MemoryStream {
  text = "";

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}
