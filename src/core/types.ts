export type { AiProvider, OutputFormat } from "./types/common.js";
export type { GrillCommandOptions } from "./types/grill.js";
export type {
  Assessment,
  AssessmentSections,
  PanelResult,
  Persona,
  PersonaRole,
  QuestionSet,
  RunState,
  Transcript
} from "./types/panel.js";
