import type { QuestionSet } from "../types.js";

export function formatQuestionBlock(entry: QuestionSet): string {
  return `${entry.label}: ${entry.text}`;
}

/** Labeled blocks in the given order, separated by a blank line. */
export function aggregate(entries: readonly QuestionSet[]): string {
  return entries.map(formatQuestionBlock).join("\n\n");
}
