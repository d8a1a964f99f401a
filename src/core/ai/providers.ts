import { runCommand } from "./process-runner.js";
import type { CommandResult, StatusCallback } from "./contracts.js";

const CODEX_SANDBOX_MODE = "read-only";
const CODEX_REASONING_EFFORT = "medium";

export type CliProvider = "codex" | "claude";

export interface CliPromptOptions {
  cwd?: string | undefined;
  onStatus?: StatusCallback | undefined;
  model?: string | undefined;
  timeoutMs?: number | undefined;
  signal?: AbortSignal | undefined;
}

export function summarizeFailure(result: CommandResult): string {
  const reason = result.reason ?? "unknown error";
  const combined = `${result.stderr}\n${result.stdout}`.replace(/\s+/g, " ").trim();
  if (!combined) return reason;
  const snippet = combined.length > 280 ? `${combined.slice(0, 280)}...` : combined;
  return `${reason}: ${snippet}`;
}

function commandOptions(options: CliPromptOptions): Parameters<typeof runCommand>[2] {
  return {
    cwd: options.cwd,
    ...(typeof options.timeoutMs === "number" ? { timeoutMs: options.timeoutMs } : {}),
    ...(options.signal ? { signal: options.signal } : {})
  };
}

async function runCodexPrompt(prompt: string, options: CliPromptOptions = {}): Promise<CommandResult> {
  const args = [
    "exec",
    "--sandbox",
    CODEX_SANDBOX_MODE,
    "--skip-git-repo-check",
    "-c",
    `model_reasoning_effort="${CODEX_REASONING_EFFORT}"`
  ];
  if (options.model) {
    args.push("--model", options.model);
  }
  args.push(prompt);

  return runCommand("codex", args, commandOptions(options));
}

async function runClaudePrompt(prompt: string, options: CliPromptOptions = {}): Promise<CommandResult> {
  const primaryArgs = ["-p", prompt, "--tools", "", "--no-session-persistence"];
  if (options.model) {
    primaryArgs.push("--model", options.model);
  }

  const primary = await runCommand("claude", primaryArgs, commandOptions(options));
  if (primary.ok || options.signal?.aborted) return primary;
  options.onStatus?.("Claude rejected the primary invocation; retrying with a plain prompt...");

  const fallbackArgs = ["-p", prompt];
  if (options.model) {
    fallbackArgs.push("--model", options.model);
  }
  return runCommand("claude", fallbackArgs, commandOptions(options));
}

export async function runCliPrompt(
  provider: CliProvider,
  prompt: string,
  options: CliPromptOptions = {}
): Promise<CommandResult> {
  return provider === "codex" ? runCodexPrompt(prompt, options) : runClaudePrompt(prompt, options);
}
