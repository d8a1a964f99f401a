import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { runWithLiveStatus, startLiveStatus } from "../src/core/ai/status.js";

describe("live status heartbeat", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("cycles waiting messages with elapsed seconds", () => {
    const messages: string[] = [];
    const stop = startLiveStatus("codex", (message) => messages.push(message));

    vi.advanceTimersByTime(1400 * 3);
    stop();
    vi.advanceTimersByTime(1400 * 3);

    expect(messages).toEqual([
      "Waiting for codex... (1s)",
      "codex is drafting a response... (2s)",
      "codex is still thinking... (4s)"
    ]);
  });

  it("stops the heartbeat when the task settles", async () => {
    const onStatus = vi.fn();

    await expect(runWithLiveStatus("claude", onStatus, async () => "done")).resolves.toBe("done");
    vi.advanceTimersByTime(5000);

    expect(onStatus).not.toHaveBeenCalled();
  });
});
