import { describe, it, expect, vi } from "vitest";
import { runCli, type CliDeps } from "../../src/cli/program.js";
import { VERSION } from "../../src/version.js";
import { fakeSpawn, MemoryStream, type FakeScript } from "../helpers/fake-child.js";
import { fakeGit, NOT_A_REPO } from "../helpers/fake-git.js";

const REPO = "/work/repo";

const stagedRepo = () =>
  fakeGit({
    "git rev-parse --git-dir": ".git\n",
    "git diff --staged": "diff --git a/x b/x\n+hello\n",
  });

function harness(script: FakeScript, overrides: CliDeps = {}) {
  const stdout = new MemoryStream();
  const stderr = new MemoryStream();
  const spawned = fakeSpawn(script);
  const deps: CliDeps = {
    stdout,
    stderr,
    env: { GIT_AI_BACKEND: "codex" },
    cwd: REPO,
    agentrcPath: "/nonexistent/.agentrc",
    isAvailable: () => false,
    run: stagedRepo().run,
    runner: { spawn: spawned.spawn, diagnostics: new MemoryStream(), now: () => 0 },
    ...overrides,
  };
  return { stdout, stderr, spawned, run: (...args: string[]) => runCli(["--no-spinner", ...args], deps) };
}

const ANSWER: FakeScript = {
  stdout: [
    '{"type":"item.completed","item":{"type":"agent_message","text":"feat: add x and y"}}',
    '{"type":"turn.completed","usage":{"input_tokens":10,"cached_input_tokens":2,"output_tokens":5}}',
  ],
};

describe("git-cc-ai", () => {
  it("prints the message with its usage trailer", async () => {
    const { stdout, stderr, spawned, run } = harness(ANSWER);

    const code = await run("fix", "login");

    expect(code).toBe(0);
    expect(stdout.text).toBe("feat: add x and y\n\n# tokens: input=10 cached=2 output=5 elapsed=0s");
    expect(stderr.text).toBe("");
    expect(spawned.requests[0]?.cwd).toBe(REPO);
    expect(spawned.children[0]?.stdinText.endsWith("\nExtra context:\nfix login\n")).toBe(true);
  });

  it("reports an empty answer without failing", async () => {
    const { stdout, run } = harness({ stdout: [] });

    expect(await run()).toBe(0);
    expect(stdout.text).toBe("\n\n# something went wrong\n");
  });

  it("reports errors on both streams", async () => {
    const { stdout, stderr, spawned, run } = harness(ANSWER, { run: fakeGit({ "git rev-parse --git-dir": NOT_A_REPO }).run });

    expect(await run()).toBe(1);
    expect(stdout.text).toBe("\n\n\n# something went wrong not a git directory: /work/repo\n");
    expect(stderr.text).toBe("not a git directory: /work/repo\n");
    expect(spawned.requests).toEqual([]);
  });

  it("reports an empty index", async () => {
    const { stderr, run } = harness(ANSWER, {
      run: fakeGit({ "git rev-parse --git-dir": ".git\n", "git diff --staged": "" }).run,
    });

    expect(await run()).toBe(1);
    expect(stderr.text).toBe("no staged diff content found\n");
  });

  it("rejects an unsupported --model before running anything", async () => {
    const { stdout, stderr, spawned, run } = harness(ANSWER, { env: { GIT_AI_BACKEND: "gemini" } });

    expect(await run("--model", "gpt-4")).toBe(1);
    expect(stdout.text).toBe("");
    expect(stderr.text).toBe(
      'invalid model "gpt-4" (use -m for interactive pick, or one of: gemini-2.5-pro, gemini-2.5-flash)\n'
    );
    expect(spawned.requests).toEqual([]);
  });

  it("opens the model menu for a bare -m", async () => {
    const selectModel = vi.fn(async () => "gemini-2.5-pro");
    const { spawned, run } = harness(
      { stdout: ['{"type":"message","role":"assistant","content":"fix: y"}'] },
      { env: { GIT_AI_BACKEND: "gemini" }, selectModel }
    );

    expect(await run("-m")).toBe(0);
    expect(selectModel).toHaveBeenCalledWith(["gemini-2.5-pro", "gemini-2.5-flash"]);
    expect(spawned.requests[0]?.args).toContain("gemini-2.5-pro");
  });

  it("picks the backend with --backend", async () => {
    const { spawned, run } = harness(ANSWER, { env: { GIT_AI_BACKEND: "gemini" } });

    await run("--backend", "codex");

    expect(spawned.requests[0]?.command).toBe("codex");
  });

  it("prints the version", async () => {
    const { stdout, run } = harness(ANSWER);

    expect(await run("--version")).toBe(0);
    expect(stdout.text).toBe(`${VERSION}\n`);
  });

  it("lists the environment variables in the help", async () => {
    const { stdout, run } = harness(ANSWER);

    expect(await run("--help")).toBe(0);
    expect(stdout.text).toContain("GIT_AI_NO_SESSION");
    expect(stdout.text).toContain("--skill-path <path>");
  });

  it("fails on unknown options", async () => {
    const { stderr, run } = harness(ANSWER);

    expect(await run("--bogus")).toBe(1);
    expect(stderr.text).toContain("unknown option '--bogus'");
  });
});
