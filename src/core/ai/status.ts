import type { StatusCallback } from "./contracts.js";

const HEARTBEAT_INTERVAL_MS = 1400;

export function startLiveStatus(label: string, onStatus?: StatusCallback): () => void {
  if (!onStatus) return () => {};

  const cycle = [`Waiting for ${label}...`, `${label} is drafting a response...`, `${label} is still thinking...`];

  const startedAt = Date.now();
  let index = 0;
  const timer = setInterval(() => {
    const elapsedSeconds = Math.floor((Date.now() - startedAt) / 1000);
    onStatus(`${cycle[index % cycle.length]} (${elapsedSeconds}s)`);
    index += 1;
  }, HEARTBEAT_INTERVAL_MS);
  timer.unref();

  return () => clearInterval(timer);
}

export async function runWithLiveStatus<T>(
  label: string,
  onStatus: StatusCallback | undefined,
  runTask: () => Promise<T>
): Promise<T> {
  const stopLiveStatus = startLiveStatus(label, onStatus);
  try {
    return await runTask();
  } finally {
    stopLiveStatus();
  }
}
