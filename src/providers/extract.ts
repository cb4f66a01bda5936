/**
 * Final text extraction, run once after the backend's stdout ends.
 *
 * Output is collected from, in order:
 * 1. the last `result` event with non-blank text (authoritative)
 * 2. the last completed `message` event in the raw output
 * 3. accumulated deltas, for backends whose answer only arrives as deltas
 * 4. for backends with raw fallback: a known string field of a single
 *    JSON object, else the raw output verbatim
 *
 * @module extract
 */

import { decodeStreamLine, type EventDecoder } from "./events.js";

/** Keys tried, in order, when the whole output is one JSON object. */
export const FALLBACK_JSON_KEYS = ["output", "stdout", "result", "message"] as const;

export interface ExtractionInput {
  /** Complete stdout, newline-joined */
  raw: string;
  /** Text of the last result event, if any */
  resultText?: string;
  /** Concatenated assistant deltas */
  deltaText: string;
}

export interface ExtractionStrategy {
  decoders: readonly EventDecoder[];
  /** Use accumulated deltas as the answer (step 3) */
  answerFromDeltas: boolean;
  /** Fall back to JSON field scan and raw output (step 4) */
  rawFallback: boolean;
}

/**
 * Last non-blank completed message in the output.
 * Backends may emit several; the last reflects the final state.
 */
export function lastCompletedMessage(raw: string, decoders: readonly EventDecoder[]): string {
  let last = "";
  for (const line of raw.split("\n")) {
    const event = decodeStreamLine(line, decoders);
    if (event.kind === "message" && event.text.trim()) {
      last = event.text;
    }
  }
  return last;
}

/**
 * Naive quoted-string scan for the first of `keys` present in `raw`.
 *
 * Only handles backslash-escaped characters by dropping the backslash;
 * `\n` becomes "n" and `\uXXXX` is not decoded. Good enough for the flat
 * string payloads it is used on.
 */
export function extractJsonField(raw: string, keys: readonly string[]): string {
  for (const key of keys) {
    const needle = `"${key}":`;
    const idx = raw.indexOf(needle);
    if (idx === -1) continue;

    const rest = raw.slice(idx + needle.length).replace(/^[ \n\r\t]+/, "");
    if (!rest.startsWith('"')) continue;

    let out = "";
    let escaped = false;
    for (const ch of rest.slice(1)) {
      if (escaped) {
        out += ch;
        escaped = false;
        continue;
      }
      if (ch === "\\") {
        escaped = true;
        continue;
      }
      if (ch === '"') {
        return out;
      }
      out += ch;
    }
  }
  return "";
}

/**
 * Apply the fallback chain. Returns "" when nothing usable was found.
 */
export function extractFinalText(input: ExtractionInput, strategy: ExtractionStrategy): string {
  if (input.resultText?.trim()) {
    return input.resultText.trim();
  }

  const message = lastCompletedMessage(input.raw, strategy.decoders);
  if (message.trim()) {
    return message.trim();
  }

  if (strategy.answerFromDeltas && input.deltaText.trim()) {
    return input.deltaText.trim();
  }

  if (!strategy.rawFallback) {
    return "";
  }

  const output = input.raw.trim();
  if (output.startsWith("{")) {
    const extracted = extractJsonField(output, FALLBACK_JSON_KEYS);
    if (extracted.trim()) {
      return extracted.trim();
    }
  }
  return output;
}
