/**
 * claude backend
 *
 * Runs the claude CLI in print mode with stream-json on both sides. The
 * diff goes in as one user turn per directory chunk, followed by a final
 * turn asking for the message; the rules go in the system prompt so they
 * are cached across turns. claude answers every turn, so only the last
 * `result` event counts.
 */

import { z } from "zod";
import { buildChunkMessage, buildFinalTurnMessage, buildSystemPrompt } from "../../commit/prompt.js";
import type { ModelUsage, UsageStats } from "../../commit/usage-comment.js";
import { inputAsChunks } from "../../types.js";
import { defineDecoder, UNRECOGNIZED } from "../events.js";
import type { BackendDescriptor } from "../runner.js";

export const CLAUDE_DEFAULT_BUDGET_USD = 1.0;

export const CLAUDE_MODELS = [
  "claude-haiku-4-5-20251001",
  "claude-sonnet-4-6",
  "claude-opus-4-6",
] as const;

const count = z.number().catch(0);
const text = z.string().catch("");

const textDeltaSchema = z.object({
  type: z.literal("stream_event"),
  event: z.object({
    type: z.literal("content_block_delta"),
    delta: z.object({ type: z.literal("text_delta"), text: z.string() }),
  }),
});

const contentBlockSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
  input: z.record(z.unknown()).optional(),
});

const assistantSchema = z.object({
  type: z.literal("assistant"),
  message: z.object({ content: z.array(contentBlockSchema) }),
});

const modelUsageSchema = z.object({
  inputTokens: count,
  outputTokens: count,
  cacheReadInputTokens: count,
  cacheCreationInputTokens: count,
  webSearchRequests: count,
});

const resultSchema = z.object({
  type: z.literal("result"),
  subtype: text,
  result: text,
  is_error: z.boolean().catch(false),
  session_id: text,
  total_cost_usd: count,
  usage: z
    .object({
      input_tokens: count,
      cache_read_input_tokens: count,
      output_tokens: count,
    })
    .catch({ input_tokens: 0, cache_read_input_tokens: 0, output_tokens: 0 }),
  modelUsage: z.record(modelUsageSchema).catch({}),
});

const systemInitSchema = z.object({
  type: z.literal("system"),
  subtype: z.literal("init"),
  session_id: z.string(),
});

type ContentBlock = z.infer<typeof contentBlockSchema>;

/**
 * Progress narration for an assistant message: the last tool call as
 * "description: command", otherwise the message text.
 */
export function narrateContent(content: ContentBlock[]): string {
  let narration = "";
  for (const block of content) {
    if (block.type === "tool_use" && block.input) {
      const desc = typeof block.input.description === "string" ? block.input.description : "";
      const cmd = typeof block.input.command === "string" ? block.input.command : "";
      if (desc && cmd) narration = `${desc}: ${cmd}`;
      else if (desc || cmd) narration = desc || cmd;
    } else if (block.type === "text" && !narration && block.text?.trim()) {
      narration = block.text.trim();
    }
  }
  return narration;
}

function toUsage(result: z.infer<typeof resultSchema>): UsageStats {
  const models: ModelUsage[] = Object.entries(result.modelUsage)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([model, usage]) => ({ model, ...usage }));

  return {
    inputTokens: result.usage.input_tokens,
    cachedInputTokens: result.usage.cache_read_input_tokens,
    outputTokens: result.usage.output_tokens,
    costUsd: result.total_cost_usd,
    models,
    errorSubtype: result.is_error && result.subtype ? result.subtype : undefined,
  };
}

export const CLAUDE_DECODERS = [
  defineDecoder(textDeltaSchema, (ev) => ({ kind: "delta", text: ev.event.delta.text })),
  defineDecoder(assistantSchema, (ev) => {
    const [first] = ev.message.content;
    const narration = narrateContent(ev.message.content);
    const messageText = first?.type === "text" ? first.text ?? "" : "";
    if (!messageText && !narration) return UNRECOGNIZED;
    return { kind: "message", text: messageText, narration: narration || undefined };
  }),
  defineDecoder(resultSchema, (ev) => ({
    kind: "result",
    text: ev.result,
    subtype: ev.subtype || undefined,
    isError: ev.is_error,
    sessionId: ev.session_id || undefined,
    usage: toUsage(ev),
  })),
  defineDecoder(systemInitSchema, (ev) => ({ kind: "session", sessionId: ev.session_id })),
];

/**
 * One stream-json user message.
 */
export function encodeUserTurn(content: string): string {
  return JSON.stringify({
    type: "user",
    message: {
      type: "message",
      role: "user",
      content: [{ type: "text", text: content }],
    },
  });
}

export const claudeBackend: BackendDescriptor = {
  name: "claude",
  executable: "claude",
  models: CLAUDE_MODELS,
  defaultModel: "claude-haiku-4-5-20251001",
  input: "chunks",
  extraRules: "Do not add AI attribution, co-author trailers or sign-offs to the commit message.",
  decoders: CLAUDE_DECODERS,
  answerFromDeltas: false,
  rawFallback: false,

  buildInvocation(request, model) {
    const chunks = inputAsChunks(request.input);
    const turns = [
      ...chunks.map((chunk) => encodeUserTurn(buildChunkMessage(chunk.dir, chunk.diff))),
      encodeUserTurn(buildFinalTurnMessage(request.extraNote)),
    ];

    const budgetUsd = request.budgetUsd && request.budgetUsd > 0 ? request.budgetUsd : CLAUDE_DEFAULT_BUDGET_USD;
    const resolved = model ?? "claude-haiku-4-5-20251001";

    const args = [
      "--print",
      "--model", resolved,
      "--system-prompt", buildSystemPrompt({ skillText: request.skillText, noCC: request.noCC }),
      "--input-format=stream-json",
      "--output-format=stream-json", "--verbose", "--include-partial-messages",
      "--no-session-persistence",
      "--max-budget-usd", String(budgetUsd),
    ];
    const sessionId = request.sessionId?.trim();
    if (sessionId) {
      args.unshift(`--resume=${sessionId}`, "--fork-session");
    }

    return {
      args,
      stdin: turns.map((turn) => `${turn}\n`).join(""),
      stdinSummary: `${chunks.length} dir chunk(s)`,
      label: `claude +${resolved}`,
      initialProgress: sessionId ? `Resuming session ${sessionId}` : undefined,
      budgetUsd,
    };
  },
};
