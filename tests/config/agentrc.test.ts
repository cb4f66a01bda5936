import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, it, expect } from "vitest";
import { EMPTY_AGENTRC, loadAgentrc, parseAgentrc } from "../../src/config/agentrc.js";

describe("parseAgentrc", () => {
  it("reads export lines", () => {
    const config = parseAgentrc(
      [
        "# project defaults",
        "export CLAUDE_SESSION_ID=5f0c2a1e",
        "export GIT_AI_BACKEND=gemini",
        "export GIT_AI_MODEL= gemini-2.5-pro ",
        "export GIT_AI_NO_CC=TRUE",
        "export GIT_AI_NO_SESSION=false",
        "export GIT_AI_BUDGET=0.5",
        "export UNRELATED=1",
      ].join("\n")
    );

    expect(config).toEqual({
      sessionId: "5f0c2a1e",
      backend: "gemini",
      model: "gemini-2.5-pro",
      noCC: true,
      noSession: false,
      budgetUsd: 0.5,
    });
  });

  it("accepts lines without export and quoted values", () => {
    expect(parseAgentrc('GIT_AI_BACKEND="codex"\nGIT_AI_NO_SESSION=true\n')).toEqual({
      sessionId: undefined,
      backend: "codex",
      model: undefined,
      noCC: false,
      noSession: true,
      budgetUsd: undefined,
    });
  });

  it("ignores budgets that are not positive numbers", () => {
    expect(parseAgentrc("export GIT_AI_BUDGET=lots").budgetUsd).toBeUndefined();
    expect(parseAgentrc("export GIT_AI_BUDGET=0").budgetUsd).toBeUndefined();
    expect(parseAgentrc("export GIT_AI_BUDGET=-2").budgetUsd).toBeUndefined();
  });

  it("treats blank values as unset", () => {
    expect(parseAgentrc("export GIT_AI_MODEL=\nexport GIT_AI_BACKEND=").backend).toBeUndefined();
  });
});

describe("loadAgentrc", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("returns the empty config for a missing file", () => {
    expect(loadAgentrc("/nonexistent/.agentrc")).toEqual(EMPTY_AGENTRC);
  });

  it("reads a file from disk", () => {
    dir = mkdtempSync(join(tmpdir(), "agentrc-"));
    const file = join(dir, ".agentrc");
    writeFileSync(file, "export GIT_AI_BACKEND=claude\n");

    expect(loadAgentrc(file).backend).toBe("claude");
  });
});
