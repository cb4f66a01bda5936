/**
 * Streaming Event Parser
 *
 * Backends print one JSON object per line. Each backend gets an ordered
 * list of decoders (zod schema + mapper); a line is matched against them
 * in order and the first schema that fits decides the event. Anything
 * else, including non-JSON diagnostic lines, is `unrecognized`.
 *
 * ## EVENTS
 *
 * - delta:     incremental assistant text
 * - message:   a completed assistant message (last one wins at the end)
 * - reasoning: narration for the progress indicator (thinking, tool use)
 * - result:    the final answer; takes precedence over everything else
 * - usage:     token counts for the trailer
 * - session:   resumable session/thread id (first non-blank wins)
 * - error:     backend-reported failure
 *
 * @module events
 */

import type { z } from "zod";
import type { UsageStats } from "../commit/usage-comment.js";

export type StreamEvent =
  | { kind: "delta"; text: string }
  | { kind: "message"; text: string; narration?: string }
  | { kind: "reasoning"; text: string }
  | {
      kind: "result";
      text: string;
      subtype?: string;
      isError: boolean;
      sessionId?: string;
      usage?: UsageStats;
    }
  | { kind: "usage"; usage: UsageStats }
  | { kind: "session"; sessionId: string }
  | { kind: "error"; message: string }
  | { kind: "unrecognized" };

export const UNRECOGNIZED: StreamEvent = { kind: "unrecognized" };

/** Maps an already-parsed JSON value to an event, or undefined if the schema does not fit. */
export type EventDecoder = (value: unknown) => StreamEvent | undefined;

/**
 * Pair a schema with the mapping applied to values it accepts.
 *
 * @example
 * ```typescript
 * const sessionDecoder = defineDecoder(
 *   z.object({ type: z.literal("init"), session_id: z.string() }),
 *   (ev) => ({ kind: "session", sessionId: ev.session_id })
 * );
 * ```
 */
export function defineDecoder<S extends z.ZodTypeAny>(
  schema: S,
  toEvent: (value: z.output<S>) => StreamEvent
): EventDecoder {
  return (value) => {
    const parsed = schema.safeParse(value);
    return parsed.success ? toEvent(parsed.data) : undefined;
  };
}

/**
 * Decode one output line. Never throws: malformed JSON, non-object JSON
 * and unknown shapes all come back as `unrecognized`.
 */
export function decodeStreamLine(raw: string, decoders: readonly EventDecoder[]): StreamEvent {
  const line = raw.trim();
  if (!line.startsWith("{")) {
    return UNRECOGNIZED;
  }

  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return UNRECOGNIZED;
  }

  for (const decode of decoders) {
    const event = decode(value);
    if (event) return event;
  }
  return UNRECOGNIZED;
}

/**
 * Unwrap error messages that are themselves JSON envelopes, preferring
 * a nested `detail` (e.g. `{"detail":"rate limited"}` → "rate limited").
 */
export function unwrapErrorMessage(message: string): string {
  const trimmed = message.trim();
  if (!trimmed.startsWith("{")) return trimmed;

  try {
    const envelope: unknown = JSON.parse(trimmed);
    if (envelope && typeof envelope === "object" && "detail" in envelope) {
      const { detail } = envelope;
      if (typeof detail === "string" && detail.trim()) {
        return detail.trim();
      }
    }
  } catch {
    return trimmed;
  }
  return trimmed;
}
