/**
 * git-cc-ai command line.
 *
 * Prints the drafted message on stdout so it can be piped into
 * `git commit -F -` or an editor template. Diagnostics, the progress
 * indicator and the model menu use stderr.
 *
 * Exit status: 0 on success (including an empty answer, reported as a
 * "# something went wrong" comment), 1 on any error.
 */

import { join } from "path";
import { Command, CommanderError } from "commander";
import { loadAgentrc } from "../config/agentrc.js";
import { resolveSettings, type ModelFlags, type Settings } from "../config/settings.js";
import { buildRequest, generate } from "../providers/index.js";
import { ProcessRegistry } from "../providers/registry.js";
import type { RunnerDeps } from "../providers/runner.js";
import { selectModel } from "../ui/model-menu.js";
import type { CommandRunner } from "../utils/command.js";
import { VERSION } from "../version.js";

const ENV_HELP = `
Environment (also read from .agentrc as "export KEY=value"):
  GIT_AI_BACKEND     claude, gemini or codex (auto-detected from PATH if unset)
  GIT_AI_MODEL       preferred model; unknown names fall back to the default
  GIT_AI_NO_CC       "true" for plain commit messages instead of Conventional Commits
  GIT_AI_NO_SESSION  "true" to skip resuming CLAUDE_SESSION_ID from .agentrc
  GIT_AI_BUDGET      maximum spend in USD per run (claude; default 1.0)
  GIT_AI_DEBUG       "1" to log backend stderr and parser details
`;

interface CliOptions extends ModelFlags {
  skillPath?: string;
  spinner: boolean;
}

export interface CliStreams {
  stdout: { write(chunk: string): boolean };
  stderr: { write(chunk: string): boolean };
}

export interface CliDeps extends Partial<CliStreams> {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Location of .agentrc; defaults to the working directory's */
  agentrcPath?: string;
  isAvailable?: (executable: string) => boolean;
  selectModel?: (models: readonly string[]) => Promise<string>;
  runner?: RunnerDeps;
  /** Command runner for git */
  run?: CommandRunner;
  /** Install SIGINT/SIGTERM handlers for the duration of the run */
  handleSignals?: boolean;
}

export function buildProgram(streams: CliStreams): Command {
  return new Command()
    .name("git-cc-ai")
    .description("Draft a Conventional Commit message for the staged changes with claude, gemini or codex.")
    .version(VERSION)
    .argument("[note...]", "extra context passed to the backend")
    .option("--skill-path <path>", "SKILL.md-style file with additional instructions")
    .option("--no-spinner", "disable the progress indicator")
    .option("--model <name>", "model name; must be one the backend supports")
    .option("-m [name]", "model name, or no value to pick from a menu")
    .option("--backend <name>", "backend to use (overrides GIT_AI_BACKEND)")
    .addHelpText("after", ENV_HELP)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => void streams.stdout.write(str),
      writeErr: (str) => void streams.stderr.write(str),
    });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run the CLI with user arguments (no node/script prefix).
 *
 * @returns the process exit code
 */
export async function runCli(args: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const env = deps.env ?? process.env;
  const cwd = deps.cwd ?? process.cwd();

  const program = buildProgram({ stdout, stderr });
  try {
    program.parse(args, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  const options = program.opts<CliOptions>();
  const extraNote = program.args.join(" ");

  let settings: Settings;
  let model: string | undefined;
  try {
    settings = resolveSettings({
      flags: options,
      env,
      rc: loadAgentrc(deps.agentrcPath ?? join(cwd, ".agentrc")),
      isAvailable: deps.isAvailable,
    });
    model =
      settings.model.kind === "menu"
        ? await (deps.selectModel ?? selectModel)(settings.model.models)
        : settings.model.model;
  } catch (err) {
    stderr.write(`${errorMessage(err)}\n`);
    return 1;
  }

  const registry = new ProcessRegistry();
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    registry.forwardSignal(signal);
    registry.stopProgressIfSet();
    controller.abort();
  };
  if (deps.handleSignals) {
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  }

  try {
    const request = buildRequest(settings.backend, {
      extraNote,
      skillPath: options.skillPath,
      noCC: settings.noCC,
      model,
      sessionId: settings.sessionId,
      budgetUsd: settings.budgetUsd,
      showProgress: options.spinner,
      cwd,
      signal: controller.signal,
      run: deps.run,
    });
    const message = await generate(settings.backend, request, registry, deps.runner);

    if (!message.trim()) {
      stdout.write("\n\n# something went wrong\n");
      return 0;
    }
    stdout.write(message.trim());
    return 0;
  } catch (err) {
    const msg = errorMessage(err);
    stdout.write(`\n\n\n# something went wrong ${msg}\n`);
    stderr.write(`${msg}\n`);
    return 1;
  } finally {
    if (deps.handleSignals) {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    }
  }
}
