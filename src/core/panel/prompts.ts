import type { Persona } from "../types.js";

function personaPreamble(persona: Persona): string[] {
  return [`You are the ${persona.title}.`, `Goal: ${persona.goal}`, "", persona.backstory, ""];
}

export function buildQuestionPrompt(pitch: string, persona: Persona): string {
  const lines = [
    ...personaPreamble(persona),
    `Review this roadmap pitch and ask 2-3 tough ${persona.questionFocus} questions:`,
    "",
    "PITCH:",
    pitch,
    "",
    `Ask questions a ${persona.title} would ask:`,
    ...persona.questionAngles.map((angle) => `- ${angle}`),
    "",
    persona.closingGuidance,
    "",
    `Expected output: 2-3 tough ${persona.questionFocus}-focused questions about the roadmap pitch.`
  ];

  return lines.join("\n");
}

export function buildEvaluationPrompt(pitch: string, compositeQuestions: string, evaluator: Persona): string {
  const lines = [
    ...personaPreamble(evaluator),
    "Based on the stakeholder questions raised about this pitch, provide a readiness assessment:",
    "",
    "ORIGINAL PITCH:",
    pitch,
    "",
    "STAKEHOLDER QUESTIONS:",
    compositeQuestions,
    "",
    "Provide:",
    "1. **Readiness Score**: 1-10 (10 = ready to present to real stakeholders)",
    "2. **Strengths**: What's strong about this pitch?",
    "3. **Gaps**: What needs more work before the real meeting?",
    "4. **Suggested Improvements**: 3 specific things to add or clarify",
    "",
    "Be honest and helpful. The goal is to make them better prepared.",
    "",
    "Expected output: A readiness assessment with score, strengths, gaps, and improvement suggestions."
  ];

  return lines.join("\n");
}
