import { describe, it, expect } from "vitest";
import { z } from "zod";
import { decodeStreamLine, defineDecoder, unwrapErrorMessage } from "../../src/providers/events.js";

const decoders = [
  defineDecoder(z.object({ type: z.literal("a"), text: z.string() }), (ev) => ({ kind: "delta", text: ev.text })),
  defineDecoder(z.object({ type: z.string() }), (ev) => ({ kind: "reasoning", text: ev.type })),
];

describe("decodeStreamLine", () => {
  it("uses the first decoder whose schema fits", () => {
    expect(decodeStreamLine('{"type":"a","text":"hi"}', decoders)).toEqual({ kind: "delta", text: "hi" });
    expect(decodeStreamLine('{"type":"a"}', decoders)).toEqual({ kind: "reasoning", text: "a" });
  });

  it("tolerates surrounding whitespace", () => {
    expect(decodeStreamLine('  {"type":"a","text":"x"}\r', decoders)).toEqual({ kind: "delta", text: "x" });
  });

  it("returns unrecognized for anything else", () => {
    expect(decodeStreamLine("", decoders)).toEqual({ kind: "unrecognized" });
    expect(decodeStreamLine("Loading model...", decoders)).toEqual({ kind: "unrecognized" });
    expect(decodeStreamLine('{"type":', decoders)).toEqual({ kind: "unrecognized" });
    expect(decodeStreamLine("[1,2]", decoders)).toEqual({ kind: "unrecognized" });
    expect(decodeStreamLine('{"kind":"other"}', decoders)).toEqual({ kind: "unrecognized" });
  });
});

describe("unwrapErrorMessage", () => {
  it("prefers a nested detail", () => {
    expect(unwrapErrorMessage('{"detail":"rate limited"}')).toBe("rate limited");
  });

  it("keeps other messages as they are", () => {
    expect(unwrapErrorMessage("  plain failure ")).toBe("plain failure");
    expect(unwrapErrorMessage('{"error":"x"}')).toBe('{"error":"x"}');
    expect(unwrapErrorMessage('{"detail":')).toBe('{"detail":');
    expect(unwrapErrorMessage('{"detail":"  "}')).toBe('{"detail":"  "}');
  });
});
