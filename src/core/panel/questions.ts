import type { TextGenerator } from "../ai/contracts.js";
import type { Persona, QuestionSet } from "../types.js";
import { buildQuestionPrompt } from "./prompts.js";
import { callGenerator } from "./stage-call.js";
import type { StageCallOptions } from "./stage-call.js";

export async function generateQuestions(
  pitch: string,
  persona: Persona,
  generator: TextGenerator,
  options: StageCallOptions = {}
): Promise<QuestionSet> {
  const prompt = buildQuestionPrompt(pitch, persona);
  const output = await callGenerator(generator, prompt, "questions", persona.role, options);
  return { role: persona.role, label: persona.label, text: output.trim() };
}
