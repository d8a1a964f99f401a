import type { Assessment, PanelResult, RunState } from "../../core/types.js";

const STATE_LABELS: Record<RunState, string> = {
  idle: "Assembling your stakeholder panel...",
  "generating-questions": "Step 1/3: Stakeholders are grilling your pitch...",
  aggregating: "Step 2/3: Collecting stakeholder questions...",
  evaluating: "Step 3/3: Calculating your readiness score...",
  done: "Grilling session complete.",
  failed: "Grilling session failed."
};

export function describeState(state: RunState): string {
  return STATE_LABELS[state];
}

export function formatScoreLine(assessment: Assessment): string {
  return assessment.score === null
    ? "Readiness score: not stated by the panel"
    : `Readiness score: ${assessment.score}/10`;
}

export function buildJsonReport(result: PanelResult, generator: string): Record<string, unknown> {
  return {
    generator,
    transcript: result.transcript.map((entry) => ({
      role: entry.role,
      label: entry.label,
      questions: entry.text
    })),
    assessment: {
      score: result.assessment.score,
      strengths: result.assessment.sections.strengths,
      gaps: result.assessment.sections.gaps,
      improvements: result.assessment.sections.improvements,
      text: result.assessment.text
    },
    states: result.states
  };
}
