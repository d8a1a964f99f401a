import { describe, expect, it } from "vitest";

import { runCommand } from "../src/core/ai/process-runner.js";

describe("runCommand", () => {
  it("captures stdout of a successful command", async () => {
    const result = await runCommand(process.execPath, ["-e", "process.stdout.write('questions')"], { timeoutMs: 5000 });

    expect(result).toEqual({ ok: true, stdout: "questions", stderr: "" });
  });

  it("reports the exit code of a failing command", async () => {
    const result = await runCommand(process.execPath, ["-e", "process.stderr.write('nope'); process.exit(3);"], {
      timeoutMs: 5000
    });

    expect(result.ok).toBe(false);
    expect(result.stderr).toBe("nope");
    expect(result.reason).toBe("exit code 3");
  });

  it("times out hung commands", async () => {
    const result = await runCommand(process.execPath, ["-e", "setInterval(() => {}, 1000);"], { timeoutMs: 250 });

    expect(result.ok).toBe(false);
    expect(result.reason).toBe("timeout after 0.25s");
  });

  it("terminates the child when the signal aborts", async () => {
    const controller = new AbortController();
    const startedAt = Date.now();
    setTimeout(() => controller.abort(), 100);

    const result = await runCommand(process.execPath, ["-e", "setInterval(() => {}, 1000);"], {
      timeoutMs: 10_000,
      signal: controller.signal
    });

    expect(result).toMatchObject({ ok: false, reason: "aborted" });
    expect(Date.now() - startedAt).toBeLessThan(5000);
  });

  it("does not spawn when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await runCommand("definitely-not-a-real-binary", [], { signal: controller.signal });

    expect(result).toEqual({ ok: false, stdout: "", stderr: "", reason: "aborted before start" });
  });

  it("keeps only the output tail of noisy processes", async () => {
    const result = await runCommand(
      process.execPath,
      ["-e", "const chunk='x'.repeat(2048); for (let i = 0; i < 64; i += 1) process.stdout.write(chunk); process.exit(5);"],
      { timeoutMs: 5000, maxBufferBytes: 4096 }
    );

    expect(Buffer.byteLength(result.stdout, "utf8")).toBeLessThanOrEqual(4096);
    expect(result.reason).toBe("exit code 5; output truncated to last 4096 bytes per stream");
  });
});
