import type { GenerateOptions, TextGenerator } from "../src/core/ai/contracts.js";

export type StubReply = string | Error | ((prompt: string, options: GenerateOptions) => Promise<string>);

export const EVALUATION_MARKER = "STAKEHOLDER QUESTIONS:";
export const SCENARIO_PITCH = "Ship feature X in Q2 with 2 engineers";
export const SCENARIO_ASSESSMENT = "Score: 7\nStrengths: ...\nGaps: ...\nImprovements: ...";

export type CallKind = "ceo" | "cto" | "designer" | "evaluation" | "unknown";

export function callKind(prompt: string): CallKind {
  if (prompt.includes(EVALUATION_MARKER)) return "evaluation";
  if (prompt.startsWith("You are the CEO.")) return "ceo";
  if (prompt.startsWith("You are the CTO.")) return "cto";
  if (prompt.startsWith("You are the Head of Design.")) return "designer";
  return "unknown";
}

/**
 * Replies by call kind; unmatched prompts get the fallback text.
 * Every prompt is recorded in `calls` at the moment generate() is entered.
 */
export class StubGenerator implements TextGenerator {
  readonly description = "stub generator";
  readonly calls: string[] = [];
  private readonly replies: Partial<Record<CallKind, StubReply>>;
  private readonly fallback: string;

  constructor(replies: Partial<Record<CallKind, StubReply>> = {}, fallback = "stub reply") {
    this.replies = replies;
    this.fallback = fallback;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    this.calls.push(prompt);
    const reply = this.replies[callKind(prompt)];
    if (reply === undefined) return this.fallback;
    if (reply instanceof Error) throw reply;
    if (typeof reply === "function") return reply(prompt, options);
    return reply;
  }

  kinds(): CallKind[] {
    return this.calls.map(callKind);
  }
}

export function scenarioGenerator(overrides: Partial<Record<CallKind, StubReply>> = {}): StubGenerator {
  return new StubGenerator({
    ceo: "CEO-Q",
    cto: "CTO-Q",
    designer: "Designer-Q",
    evaluation: SCENARIO_ASSESSMENT,
    ...overrides
  });
}

export function delayed(text: string, ms: number): StubReply {
  return () => new Promise((resolve) => setTimeout(() => resolve(text), ms));
}

/** Never settles on its own; rejects with the signal's reason once aborted. */
export function untilAborted(): StubReply {
  return (_prompt, options) =>
    new Promise((_resolve, reject) => {
      const signal = options.signal;
      if (!signal) return;
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      signal.addEventListener("abort", () => reject(signal.reason), { once: true });
    });
}
