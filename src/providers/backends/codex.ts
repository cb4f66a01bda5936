/**
 * codex backend
 *
 * `codex exec --json` reads the prompt from stdin and prints JSONL thread
 * events. Older releases printed bare `agent_message` / `reasoning`
 * objects instead of `item.completed` wrappers; both are accepted.
 *
 * When codex prints something other than events (older builds without
 * --json support, a wrapper script), the raw output is used as the answer.
 */

import { z } from "zod";
import { buildConventionalPrompt } from "../../commit/prompt.js";
import { inputAsDiff } from "../../types.js";
import { defineDecoder, unwrapErrorMessage } from "../events.js";
import type { BackendDescriptor } from "../runner.js";

/** @see https://developers.openai.com/codex/models/ */
export const CODEX_MODELS = [
  "gpt-5.1-codex-max",
  "gpt-5.1-codex-mini",
  "gpt-5.2-codex",
  "gpt-5.3-codex",
] as const;

const count = z.number().catch(0);

const threadStartedSchema = z.object({
  type: z.literal("thread.started"),
  thread_id: z.string(),
});

const turnCompletedSchema = z.object({
  type: z.literal("turn.completed"),
  usage: z.object({
    input_tokens: count,
    cached_input_tokens: count,
    output_tokens: count,
  }),
});

const itemCompletedSchema = z.object({
  type: z.literal("item.completed"),
  item: z.discriminatedUnion("type", [
    z.object({ type: z.literal("agent_message"), text: z.string() }),
    z.object({ type: z.literal("reasoning"), text: z.string() }),
    z.object({ type: z.literal("command_execution"), command: z.string() }),
  ]),
});

const legacyMessageSchema = z.object({
  type: z.literal("agent_message"),
  text: z.string(),
});

const legacyReasoningSchema = z.object({
  type: z.literal("reasoning"),
  text: z.string(),
});

const errorSchema = z.object({
  type: z.literal("error"),
  message: z.string(),
});

const turnFailedSchema = z.object({
  type: z.literal("turn.failed"),
  error: z.object({ message: z.string() }),
});

export const CODEX_DECODERS = [
  defineDecoder(threadStartedSchema, (ev) => ({ kind: "session", sessionId: ev.thread_id })),
  defineDecoder(turnCompletedSchema, (ev) => ({
    kind: "usage",
    usage: {
      inputTokens: ev.usage.input_tokens,
      cachedInputTokens: ev.usage.cached_input_tokens,
      outputTokens: ev.usage.output_tokens,
    },
  })),
  defineDecoder(itemCompletedSchema, ({ item }) => {
    switch (item.type) {
      case "agent_message":
        return { kind: "message", text: item.text };
      case "reasoning":
        return { kind: "reasoning", text: item.text };
      case "command_execution":
        return { kind: "reasoning", text: item.command };
    }
  }),
  defineDecoder(legacyMessageSchema, (ev) => ({ kind: "message", text: ev.text })),
  defineDecoder(legacyReasoningSchema, (ev) => ({ kind: "reasoning", text: ev.text })),
  defineDecoder(errorSchema, (ev) => ({ kind: "error", message: unwrapErrorMessage(ev.message) })),
  defineDecoder(turnFailedSchema, (ev) => ({ kind: "error", message: unwrapErrorMessage(ev.error.message) })),
];

export const codexBackend: BackendDescriptor = {
  name: "codex",
  executable: "codex",
  models: CODEX_MODELS,
  input: "diff",
  decoders: CODEX_DECODERS,
  answerFromDeltas: false,
  rawFallback: true,

  buildInvocation(request, model) {
    const args = model ? ["exec", "-m", model, "--json"] : ["exec", "--json"];
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
      label: model ? `codex +${model}` : "codex",
    };
  },
};
