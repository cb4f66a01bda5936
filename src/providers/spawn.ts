import { spawn } from "child_process";
import type { Readable, Writable } from "stream";
import type { SignalTarget } from "./registry.js";
import { debugLog } from "../utils/logger.js";

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * A started backend process with all three pipes wired.
 */
export interface BackendChild extends SignalTarget {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  /** Resolves once the process has exited and its pipes are closed */
  wait(): Promise<ExitStatus>;
}

export interface SpawnRequest {
  command: string;
  args: string[];
  cwd?: string;
}

/**
 * Start a process and resolve once the OS has actually launched it.
 * Rejects with the spawn error (e.g. ENOENT) otherwise.
 */
export type SpawnFn = (request: SpawnRequest) => Promise<BackendChild>;

/**
 * Default SpawnFn: node's spawn with piped stdio, and a process group of
 * its own on non-Windows platforms so one signal reaches its descendants.
 */
export const spawnBackend: SpawnFn = async ({ command, args, cwd }) => {
  const child = spawn(command, args, {
    cwd,
    stdio: ["pipe", "pipe", "pipe"],
    detached: process.platform !== "win32",
  });

  const exited = new Promise<ExitStatus>((resolve) => {
    child.once("close", (code: number | null, signal: NodeJS.Signals | null) => resolve({ code, signal }));
  });

  await new Promise<void>((resolve, reject) => {
    child.once("spawn", () => resolve());
    child.once("error", reject);
  });

  // Later errors (a failed kill, a pipe torn down) must not go unhandled
  child.on("error", (err) => debugLog(command, `process error: ${err.message}`));

  return {
    get pid() {
      return child.pid;
    },
    stdin: child.stdin,
    stdout: child.stdout,
    stderr: child.stderr,
    kill: (signal) => child.kill(signal),
    wait: () => exited,
  };
};

/**
 * Split a stream into lines ("\n" or "\r\n"); a final unterminated line is
 * yielded too. Errors on the stream propagate to the consumer.
 */
export async function* readLines(stream: Readable): AsyncGenerator<string> {
  stream.setEncoding("utf8");
  let buffer = "";

  for await (const chunk of stream) {
    buffer += typeof chunk === "string" ? chunk : String(chunk);
    const lines = buffer.split("\n");
    buffer = lines.pop() ?? "";
    for (const line of lines) {
      yield line.endsWith("\r") ? line.slice(0, -1) : line;
    }
  }

  if (buffer) {
    yield buffer.endsWith("\r") ? buffer.slice(0, -1) : buffer;
  }
}
