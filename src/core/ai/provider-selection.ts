import { spawnSync } from "node:child_process";

import type { GenerationConfig } from "../config.js";
import type { AiProvider } from "../types.js";

export type ResolvedAiProvider = Exclude<AiProvider, "auto">;

export type BinaryProbe = (command: string) => boolean;

export function hasBinary(command: string): boolean {
  const locator = process.platform === "win32" ? "where" : "which";
  const probe = spawnSync(locator, [command], { encoding: "utf8" });
  return probe.status === 0;
}

function hasHttpEndpoint(config: Pick<GenerationConfig, "baseUrl">): boolean {
  return typeof config.baseUrl === "string" && config.baseUrl.length > 0;
}

/**
 * Explicit providers are checked for availability only. `auto` prefers an installed
 * CLI (codex, then claude) and falls back to the HTTP endpoint when one is configured.
 */
export function chooseProvider(
  config: Pick<GenerationConfig, "provider" | "baseUrl">,
  probe: BinaryProbe = hasBinary
): ResolvedAiProvider | null {
  const requested = config.provider;
  if (requested === "openai") return hasHttpEndpoint(config) ? "openai" : null;
  if (requested === "codex") return probe("codex") ? "codex" : null;
  if (requested === "claude") return probe("claude") ? "claude" : null;

  const preference: Array<"codex" | "claude"> = ["codex", "claude"];
  for (const candidate of preference) {
    if (probe(candidate)) return candidate;
  }

  return hasHttpEndpoint(config) ? "openai" : null;
}
