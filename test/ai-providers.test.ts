import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  runCommand: vi.fn()
}));

vi.mock("../src/core/ai/process-runner.js", () => ({
  runCommand: mocks.runCommand
}));

describe("ai provider command wiring", () => {
  beforeEach(() => {
    mocks.runCommand.mockReset();
    mocks.runCommand.mockResolvedValue({
      ok: true,
      stdout: "ok",
      stderr: ""
    });
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it("runs codex read-only with the requested model", async () => {
    const { runCliPrompt } = await import("../src/core/ai/providers.js");

    await runCliPrompt("codex", "ask questions", {
      cwd: "/tmp/project",
      model: "gpt-5-codex",
      timeoutMs: 30_000
    });

    expect(mocks.runCommand).toHaveBeenCalledWith(
      "codex",
      [
        "exec",
        "--sandbox",
        "read-only",
        "--skip-git-repo-check",
        "-c",
        'model_reasoning_effort="medium"',
        "--model",
        "gpt-5-codex",
        "ask questions"
      ],
      {
        cwd: "/tmp/project",
        timeoutMs: 30_000
      }
    );
  });

  it("runs claude without tools or session persistence", async () => {
    const { runCliPrompt } = await import("../src/core/ai/providers.js");

    await runCliPrompt("claude", "ask questions", { cwd: "/tmp/project" });

    expect(mocks.runCommand).toHaveBeenCalledTimes(1);
    expect(mocks.runCommand).toHaveBeenCalledWith(
      "claude",
      ["-p", "ask questions", "--tools", "", "--no-session-persistence"],
      { cwd: "/tmp/project" }
    );
  });

  it("retries claude with a plain prompt when the primary invocation fails", async () => {
    mocks.runCommand.mockResolvedValueOnce({ ok: false, stdout: "", stderr: "unknown option --tools", reason: "exit code 1" });
    const onStatus = vi.fn();
    const { runCliPrompt } = await import("../src/core/ai/providers.js");

    const result = await runCliPrompt("claude", "ask questions", { model: "sonnet", onStatus });

    expect(result.ok).toBe(true);
    expect(mocks.runCommand).toHaveBeenCalledTimes(2);
    expect(mocks.runCommand.mock.calls[1]?.[1]).toEqual(["-p", "ask questions", "--model", "sonnet"]);
    expect(onStatus).toHaveBeenCalledWith("Claude rejected the primary invocation; retrying with a plain prompt...");
  });

  it("does not retry claude after the run was aborted", async () => {
    mocks.runCommand.mockResolvedValueOnce({ ok: false, stdout: "", stderr: "", reason: "aborted" });
    const controller = new AbortController();
    controller.abort();
    const { runCliPrompt } = await import("../src/core/ai/providers.js");

    const result = await runCliPrompt("claude", "ask questions", { signal: controller.signal });

    expect(result.reason).toBe("aborted");
    expect(mocks.runCommand).toHaveBeenCalledTimes(1);
  });

  it("summarizes failures with a collapsed output snippet", async () => {
    const { summarizeFailure } = await import("../src/core/ai/providers.js");

    expect(summarizeFailure({ ok: false, stdout: "", stderr: "", reason: "timeout after 300s" })).toBe(
      "timeout after 300s"
    );
    expect(summarizeFailure({ ok: false, stdout: "partial\n", stderr: "model   not\nfound", reason: "exit code 2" })).toBe(
      "exit code 2: model not found partial"
    );
  });
});
