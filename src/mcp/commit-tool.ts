import { join } from "path";
import { z } from "zod";
import { loadAgentrc } from "../config/agentrc.js";
import { resolveSettings } from "../config/settings.js";
import { buildRequest, generate } from "../providers/index.js";
import { ProcessRegistry } from "../providers/registry.js";
import type { RunnerDeps } from "../providers/runner.js";
import type { CommandRunner } from "../utils/command.js";

export const commitMessageInput = {
  working_dir: z.string().optional().describe("Repository directory (defaults to cwd)"),
  backend: z.enum(["claude", "gemini", "codex"]).optional().describe("Backend CLI (default: configured or auto-detected)"),
  model: z.string().optional().describe("Model name; must be supported by the backend"),
  extra_context: z.string().optional().describe("Additional context for the message"),
};

const commitMessageArgs = z.object(commitMessageInput);
export type CommitMessageArgs = z.infer<typeof commitMessageArgs>;

export interface CommitToolDeps {
  env?: NodeJS.ProcessEnv;
  isAvailable?: (executable: string) => boolean;
  runner?: RunnerDeps;
  run?: CommandRunner;
}

export interface ToolResult {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError?: boolean;
}

/**
 * Draft a commit message for the staged changes in `working_dir`.
 * Nothing is committed; the caller decides what to do with the text.
 */
export async function draftCommitMessage(args: CommitMessageArgs, deps: CommitToolDeps = {}): Promise<ToolResult> {
  const cwd = args.working_dir || process.cwd();

  try {
    const settings = resolveSettings({
      flags: { backend: args.backend, model: args.model },
      env: deps.env ?? process.env,
      rc: loadAgentrc(join(cwd, ".agentrc")),
      isAvailable: deps.isAvailable,
    });
    const request = buildRequest(settings.backend, {
      extraNote: args.extra_context,
      noCC: settings.noCC,
      model: settings.model.kind === "model" ? settings.model.model : undefined,
      sessionId: settings.sessionId,
      budgetUsd: settings.budgetUsd,
      showProgress: false,
      cwd,
      run: deps.run,
    });

    // One registry per call: concurrent tool calls each own their process
    const message = await generate(settings.backend, request, new ProcessRegistry(), deps.runner);
    if (!message.trim()) {
      return { content: [{ type: "text", text: "# something went wrong: the backend returned no message" }], isError: true };
    }
    return { content: [{ type: "text", text: message.trim() }] };
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return { content: [{ type: "text", text: `# something went wrong ${msg}` }], isError: true };
  }
}
