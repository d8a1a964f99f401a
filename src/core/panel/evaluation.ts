import type { TextGenerator } from "../ai/contracts.js";
import { getPersona } from "../personas.js";
import type { Assessment, AssessmentSections, Persona } from "../types.js";
import { buildEvaluationPrompt } from "./prompts.js";
import { callGenerator } from "./stage-call.js";
import type { StageCallOptions } from "./stage-call.js";

type SectionKey = "score" | keyof AssessmentSections;

const SECTION_HEADING =
  /^\s*(?:#{1,6}\s*)?(?:\d+[.)]\s*)?(?:\*\*|__)?\s*(readiness score|score|strengths?|gaps?|(?:suggested\s+)?improvements?)\s*(?:\([^)]*\)|\/\s*10\b|out\s+of\s+10\b)?\s*(?:\*\*|__)?\s*(?::\s*(?:\*\*|__)?\s*(.*)|$)/i;
const INLINE_SCORE = /\bscore\b\D{0,12}?(\d{1,2})\b/i;
// "(1-10)", "1-10", "out of 10" and "/10" name the scale, not the score.
const SCALE_EXPRESSION = /\(\s*(?:1\s*[-–]\s*10|out\s+of\s+10)\s*\)|\b1\s*[-–]\s*10\b|\bout\s+of\s+10\b|\/\s*10\b/gi;

function toSectionKey(heading: string): SectionKey {
  const lower = heading.toLowerCase();
  if (lower.includes("score")) return "score";
  if (lower.startsWith("strength")) return "strengths";
  if (lower.startsWith("gap")) return "gaps";
  return "improvements";
}

function withoutScale(text: string): string {
  return text.replace(SCALE_EXPRESSION, " ");
}

function readScore(value: string | undefined): number | null {
  if (!value) return null;
  const match = /\b(\d{1,2})\b/.exec(withoutScale(value));
  if (!match?.[1]) return null;
  const score = Number(match[1]);
  return score >= 1 && score <= 10 ? score : null;
}

function splitSections(text: string): Map<SectionKey, string> {
  const collected = new Map<SectionKey, string[]>();
  let current: string[] | null = null;

  for (const line of text.replace(/\r\n/g, "\n").split("\n")) {
    const heading = SECTION_HEADING.exec(line);
    if (heading?.[1]) {
      const key = toSectionKey(heading[1]);
      const rest = (heading[2] ?? "").replace(/(?:\*\*|__)\s*$/, "").trim();
      if (collected.has(key)) {
        current = null;
        continue;
      }
      current = rest ? [rest] : [];
      collected.set(key, current);
      continue;
    }
    current?.push(line);
  }

  const sections = new Map<SectionKey, string>();
  for (const [key, lines] of collected) {
    const body = lines.join("\n").trim();
    if (body) sections.set(key, body);
  }
  return sections;
}

/**
 * Best-effort read of the score and labeled parts of an assessment.
 * Parts the text does not label come back as null; nothing here rejects.
 */
export function readAssessment(text: string): Assessment {
  const sections = splitSections(text);
  const score = readScore(sections.get("score")) ?? readScore(INLINE_SCORE.exec(withoutScale(text))?.[1]);

  return {
    text,
    score,
    sections: {
      strengths: sections.get("strengths") ?? null,
      gaps: sections.get("gaps") ?? null,
      improvements: sections.get("improvements") ?? null
    }
  };
}

export async function evaluate(
  pitch: string,
  compositeQuestions: string,
  generator: TextGenerator,
  options: StageCallOptions & { evaluator?: Persona } = {}
): Promise<Assessment> {
  const { evaluator = getPersona("ceo"), ...callOptions } = options;
  const prompt = buildEvaluationPrompt(pitch, compositeQuestions, evaluator);
  const output = await callGenerator(generator, prompt, "evaluation", undefined, callOptions);
  return readAssessment(output);
}
