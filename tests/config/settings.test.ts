import { describe, it, expect } from "vitest";
import { EMPTY_AGENTRC, type AgentrcConfig } from "../../src/config/agentrc.js";
import { resolveSettings, type ModelFlags } from "../../src/config/settings.js";
import { ConfigError } from "../../src/errors.js";

const onPath =
  (...names: string[]) =>
  (executable: string): boolean =>
    names.includes(executable);

function resolve(flags: ModelFlags = {}, env: NodeJS.ProcessEnv = {}, rc: Partial<AgentrcConfig> = {}) {
  return resolveSettings({
    flags,
    env,
    rc: { ...EMPTY_AGENTRC, ...rc },
    isAvailable: onPath("gemini", "codex"),
  });
}

describe("backend resolution", () => {
  it("detects the first backend on PATH", () => {
    expect(resolve().backend.name).toBe("gemini");
    expect(
      resolveSettings({ flags: {}, env: {}, rc: EMPTY_AGENTRC, isAvailable: onPath("codex", "claude") }).backend.name
    ).toBe("claude");
  });

  it("prefers flag over environment over .agentrc", () => {
    expect(resolve({ backend: "claude" }, { GIT_AI_BACKEND: "codex" }, { backend: "gemini" }).backend.name).toBe(
      "claude"
    );
    expect(resolve({}, { GIT_AI_BACKEND: "codex" }, { backend: "gemini" }).backend.name).toBe("codex");
    expect(resolve({}, {}, { backend: "claude" }).backend.name).toBe("claude");
  });

  it("rejects unknown backends", () => {
    expect(() => resolve({}, { GIT_AI_BACKEND: "copilot" })).toThrow(
      'invalid GIT_AI_BACKEND value "copilot" (available: claude, codex, gemini)'
    );
  });

  it("fails when nothing is installed", () => {
    expect(() => resolveSettings({ flags: {}, env: {}, rc: EMPTY_AGENTRC, isAvailable: () => false })).toThrow(
      ConfigError
    );
  });
});

describe("model resolution", () => {
  it("accepts a supported flag model", () => {
    expect(resolve({ model: "gemini-2.5-pro" }).model).toEqual({ kind: "model", model: "gemini-2.5-pro" });
    expect(resolve({ m: "gemini-2.5-pro" }).model).toEqual({ kind: "model", model: "gemini-2.5-pro" });
  });

  it("rejects an unsupported flag model", () => {
    expect(() => resolve({ model: "gpt-4" })).toThrow(
      'invalid model "gpt-4" (use -m for interactive pick, or one of: gemini-2.5-pro, gemini-2.5-flash)'
    );
    expect(() => resolve({ m: "gpt-4" })).toThrow(ConfigError);
  });

  it("lets --model win over -m", () => {
    expect(resolve({ model: "gemini-2.5-flash", m: "gemini-2.5-pro" }).model).toEqual({
      kind: "model",
      model: "gemini-2.5-flash",
    });
  });

  it("asks for a menu on bare -m", () => {
    expect(resolve({ m: true }).model).toEqual({ kind: "menu", models: ["gemini-2.5-pro", "gemini-2.5-flash"] });
  });

  it("uses environment and .agentrc models softly", () => {
    expect(resolve({}, { GIT_AI_MODEL: "gemini-2.5-pro" }).model).toEqual({ kind: "model", model: "gemini-2.5-pro" });
    expect(resolve({}, {}, { model: "gemini-2.5-pro" }).model).toEqual({ kind: "model", model: "gemini-2.5-pro" });
    expect(resolve({}, { GIT_AI_MODEL: "gpt-4" }).model).toEqual({ kind: "model", model: undefined });
  });

  it("ignores environment models when a flag names one", () => {
    expect(resolve({ m: true }, { GIT_AI_MODEL: "gemini-2.5-pro" }).model.kind).toBe("menu");
  });
});

describe("flags and session", () => {
  it("combines environment and .agentrc switches", () => {
    expect(resolve({}, { GIT_AI_NO_CC: "true" }).noCC).toBe(true);
    expect(resolve({}, {}, { noCC: true }).noCC).toBe(true);
    expect(resolve({}, { GIT_AI_NO_CC: "yes" }).noCC).toBe(false);
  });

  it("resumes the .agentrc session unless disabled", () => {
    expect(resolve({}, {}, { sessionId: "abc" }).sessionId).toBe("abc");
    expect(resolve({}, { GIT_AI_NO_SESSION: "TRUE" }, { sessionId: "abc" }).sessionId).toBeUndefined();
    expect(resolve({}, {}, { sessionId: "abc", noSession: true }).sessionId).toBeUndefined();
  });

  it("takes the budget from the environment first", () => {
    expect(resolve({}, { GIT_AI_BUDGET: "2.5" }, { budgetUsd: 0.5 }).budgetUsd).toBe(2.5);
    expect(resolve({}, { GIT_AI_BUDGET: "nope" }, { budgetUsd: 0.5 }).budgetUsd).toBe(0.5);
    expect(resolve().budgetUsd).toBeUndefined();
  });
});
