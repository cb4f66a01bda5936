/**
 * gemini backend
 *
 * The full prompt is written to stdin; `--prompt` only carries a short
 * instruction, which gemini appends to stdin. Keeping the diff out of argv
 * avoids the per-argument size limit on large diffs.
 *
 * gemini's `result` event carries stats but no text, so the answer is the
 * concatenation of the assistant message deltas.
 */

import { z } from "zod";
import { buildConventionalPrompt } from "../../commit/prompt.js";
import { inputAsDiff } from "../../types.js";
import { defineDecoder } from "../events.js";
import type { BackendDescriptor } from "../runner.js";

export const GEMINI_MODELS = ["gemini-2.5-pro", "gemini-2.5-flash"] as const;

export const GEMINI_PROMPT_ARG = "Follow the instructions on stdin and output only the commit message.";

const count = z.number().catch(0);

const initSchema = z.object({
  type: z.literal("init"),
  session_id: z.string(),
});

const assistantMessageSchema = z.object({
  type: z.literal("message"),
  role: z.literal("assistant"),
  content: z.string(),
});

const toolUseSchema = z.object({
  type: z.literal("tool_use"),
  tool_name: z.string().catch(""),
  parameters: z.record(z.unknown()).catch({}),
});

const errorSchema = z.object({
  type: z.literal("error"),
  severity: z.string().optional(),
  message: z.string().catch("unknown error"),
});

const resultSchema = z.object({
  type: z.literal("result"),
  status: z.string().catch(""),
  session_id: z.string().optional(),
  error: z.object({ message: z.string() }).optional(),
  stats: z
    .object({ input_tokens: count, output_tokens: count, cached: count })
    .catch({ input_tokens: 0, output_tokens: 0, cached: 0 }),
});

function describeToolUse(toolName: string, parameters: Record<string, unknown>): string {
  const target = [parameters.command, parameters.file_path, parameters.path].find(
    (value): value is string => typeof value === "string" && value.trim() !== ""
  );
  return target ? `${toolName}: ${target}` : toolName;
}

export const GEMINI_DECODERS = [
  defineDecoder(initSchema, (ev) => ({ kind: "session", sessionId: ev.session_id })),
  defineDecoder(assistantMessageSchema, (ev) => ({ kind: "delta", text: ev.content })),
  defineDecoder(toolUseSchema, (ev) => ({ kind: "reasoning", text: describeToolUse(ev.tool_name, ev.parameters) })),
  // Warnings (deprecated flags, quota notices) are not failures
  defineDecoder(errorSchema.refine((ev) => ev.severity !== "warning"), (ev) => ({
    kind: "error",
    message: ev.message,
  })),
  defineDecoder(resultSchema, (ev) =>
    ev.status === "error"
      ? { kind: "error", message: ev.error?.message ?? "gemini returned an error" }
      : {
          kind: "result",
          text: "",
          isError: false,
          sessionId: ev.session_id,
          usage: {
            inputTokens: ev.stats.input_tokens,
            cachedInputTokens: ev.stats.cached,
            outputTokens: ev.stats.output_tokens,
          },
        }
  ),
];

export const geminiBackend: BackendDescriptor = {
  name: "gemini",
  executable: "gemini",
  models: GEMINI_MODELS,
  defaultModel: "gemini-2.5-flash",
  input: "diff",
  decoders: GEMINI_DECODERS,
  answerFromDeltas: true,
  rawFallback: false,

  buildInvocation(request, model) {
    const resolved = model ?? "gemini-2.5-flash";
    const args = ["--prompt", GEMINI_PROMPT_ARG, "--output-format", "stream-json", "--model", resolved];
    const sessionId = request.sessionId?.trim();
    if (sessionId) {
      args.push("--resume", sessionId);
    }

    const diff = inputAsDiff(request.input);
    return {
      args,
      stdin: buildConventionalPrompt({
        skillText: request.skillText,
        diff,
        extraNote: request.extraNote,
        noCC: request.noCC,
      }),
      stdinSummary: `prompt with ${Buffer.byteLength(diff, "utf8")} byte diff`,
      label: `gemini +${resolved}`,
      initialProgress: sessionId ? `Resuming session ${sessionId}` : undefined,
    };
  },
};
