import { execSync } from "child_process";

/** Large enough for any staged diff we would still send in full. */
const MAX_OUTPUT_BYTES = 256 * 1024 * 1024;

export interface CommandResult {
  /** Standard output */
  output: string;
  /** Standard error */
  errorOutput: string;
  exitCode: number;
}

export type CommandRunner = (cmd: string, cwd: string) => CommandResult;

function stringField(err: unknown, key: "stdout" | "stderr"): string {
  if (typeof err !== "object" || err === null || !(key in err)) return "";
  const value: unknown = Reflect.get(err, key);
  return typeof value === "string" ? value : "";
}

function exitStatus(err: unknown): number {
  if (typeof err !== "object" || err === null || !("status" in err)) return 1;
  return typeof err.status === "number" ? err.status : 1;
}

/**
 * Run a shell command and capture output.
 * Returns { output, errorOutput, exitCode } - never throws.
 */
export function runCommand(cmd: string, cwd: string): CommandResult {
  try {
    const output = execSync(cmd, {
      cwd,
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "pipe"],
      maxBuffer: MAX_OUTPUT_BYTES,
    });
    return { output, errorOutput: "", exitCode: 0 };
  } catch (err) {
    return {
      output: stringField(err, "stdout"),
      errorOutput: stringField(err, "stderr") || (err instanceof Error ? err.message : String(err)),
      exitCode: exitStatus(err),
    };
  }
}

/**
 * Escape an argument for use in shell commands.
 * Uses single quotes and escapes any embedded single quotes.
 */
export function shellEscape(value: string): string {
  return "'" + value.replace(/'/g, "'\\''") + "'";
}

/**
 * Whether an executable is available on PATH.
 */
export function isOnPath(name: string, run: CommandRunner = runCommand): boolean {
  return run(`command -v ${shellEscape(name)}`, process.cwd()).exitCode === 0;
}
