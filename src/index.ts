export { ChatCompletionsClient } from "./core/ai/chat-client.js";
export type { GenerateOptions, StatusCallback, TextGenerator } from "./core/ai/contracts.js";
export { createTextGenerator } from "./core/ai/generator.js";
export { resolveGenerationConfig } from "./core/config.js";
export type { GenerationConfig } from "./core/config.js";
export {
  ConfigError,
  ExecutionError,
  GenerationFailure,
  InvalidInputError,
  PanelError,
  PanelStateError,
  RunCancelledError,
  UserInputError
} from "./core/errors.js";
export { EXAMPLE_PITCH } from "./core/example-pitch.js";
export { aggregate } from "./core/panel/aggregate.js";
export { evaluate, readAssessment } from "./core/panel/evaluation.js";
export { PanelRun, runPanel } from "./core/panel/orchestrator.js";
export type { PanelRunOptions, StateChangeCallback } from "./core/panel/orchestrator.js";
export { generateQuestions } from "./core/panel/questions.js";
export { getPersona, listPersonas } from "./core/personas.js";
export { assertPitch, readPitch } from "./core/pitch.js";
export type {
  Assessment,
  AssessmentSections,
  PanelResult,
  Persona,
  PersonaRole,
  QuestionSet,
  RunState,
  Transcript
} from "./core/types.js";
