import { describe, it, expect } from "vitest";
import { codexBackend } from "../../src/providers/backends/codex.js";
import { extractFinalText, extractJsonField, lastCompletedMessage } from "../../src/providers/extract.js";

const strict = { decoders: codexBackend.decoders, answerFromDeltas: false, rawFallback: false };
const deltas = { ...strict, answerFromDeltas: true };
const raw = { ...strict, rawFallback: true };

const MESSAGES = [
  '{"type":"item.completed","item":{"type":"agent_message","text":"first"}}',
  "not json",
  '{"type":"item.completed","item":{"type":"agent_message","text":"  "}}',
  '{"type":"agent_message","text":"second"}',
  '{"type":"item.completed","item":{"type":"agent_message","text":"  "}}',
].join("\n");

describe("lastCompletedMessage", () => {
  it("returns the last non-blank message", () => {
    expect(lastCompletedMessage(MESSAGES, codexBackend.decoders)).toBe("second");
  });
});

describe("extractJsonField", () => {
  it("takes the first key present, in key order", () => {
    expect(extractJsonField('{"message":"m","stdout":"s"}', ["output", "stdout", "message"])).toBe("s");
  });

  it("drops backslashes from escapes", () => {
    expect(extractJsonField('{"output": "say \\"hi\\"\\nnow"}', ["output"])).toBe('say "hi"nnow');
  });

  it("skips keys whose value is not a string", () => {
    expect(extractJsonField('{"output":12,"result":"ok"}', ["output", "result"])).toBe("ok");
    expect(extractJsonField('{"output":"unterminated', ["output"])).toBe("");
  });
});

describe("extractFinalText", () => {
  it("prefers result text over everything else", () => {
    expect(extractFinalText({ raw: MESSAGES, resultText: " final ", deltaText: "d" }, raw)).toBe("final");
  });

  it("falls back to the last completed message", () => {
    expect(extractFinalText({ raw: MESSAGES, resultText: "  ", deltaText: "d" }, deltas)).toBe("second");
  });

  it("uses deltas only for backends that answer by delta", () => {
    expect(extractFinalText({ raw: "", deltaText: " from deltas " }, deltas)).toBe("from deltas");
    expect(extractFinalText({ raw: "", deltaText: " from deltas " }, strict)).toBe("");
  });

  it("uses raw output only with raw fallback", () => {
    expect(extractFinalText({ raw: "\nplain answer\n", deltaText: "" }, raw)).toBe("plain answer");
    expect(extractFinalText({ raw: "\nplain answer\n", deltaText: "" }, strict)).toBe("");
    expect(extractFinalText({ raw: '{"result":"chore: bump"}', deltaText: "" }, raw)).toBe("chore: bump");
    expect(extractFinalText({ raw: '{"other":"x"}', deltaText: "" }, raw)).toBe('{"other":"x"}');
  });
});
