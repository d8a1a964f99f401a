export type PersonaRole = "ceo" | "cto" | "designer";

export interface Persona {
  role: PersonaRole;
  /** Name the transcript labels this persona's block with. */
  label: string;
  /** Role title the generator is asked to speak as. */
  title: string;
  goal: string;
  backstory: string;
  /** Short noun used in "2-3 tough <focus> questions". */
  questionFocus: string;
  questionAngles: readonly string[];
  closingGuidance: string;
}

export interface QuestionSet {
  role: PersonaRole;
  label: string;
  text: string;
}

export type Transcript = readonly QuestionSet[];

export interface AssessmentSections {
  strengths: string | null;
  gaps: string | null;
  improvements: string | null;
}

export interface Assessment {
  text: string;
  score: number | null;
  sections: AssessmentSections;
}

export type RunState = "idle" | "generating-questions" | "aggregating" | "evaluating" | "done" | "failed";

export interface PanelResult {
  transcript: Transcript;
  composite: string;
  assessment: Assessment;
  states: RunState[];
}
