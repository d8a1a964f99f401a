import { GenerationFailure, RunCancelledError, isAbortError } from "../errors.js";
import type { GenerationStage } from "../errors.js";
import type { GenerateOptions, TextGenerator } from "../ai/contracts.js";
import type { PersonaRole } from "../types.js";

export type StageCallOptions = GenerateOptions;

/**
 * Runs one generator call for a stage. Errors come back as GenerationFailure
 * naming the stage (and persona), or RunCancelledError once the signal fired.
 * Blank output counts as unusable.
 */
export async function callGenerator(
  generator: TextGenerator,
  prompt: string,
  stage: GenerationStage,
  persona: PersonaRole | undefined,
  options: StageCallOptions = {}
): Promise<string> {
  const scope = persona ? { persona } : {};
  if (options.signal?.aborted) {
    throw new RunCancelledError(`Panel run was cancelled before the ${stage} stage.`, { cause: options.signal.reason });
  }

  let output: string;
  try {
    output = await generator.generate(prompt, options);
  } catch (error) {
    if (error instanceof RunCancelledError) throw error;
    if (options.signal?.aborted || isAbortError(error)) {
      throw new RunCancelledError(`Panel run was cancelled during the ${stage} stage.`, { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new GenerationFailure(stage, reason, { ...scope, cause: error });
  }

  if (!output.trim()) {
    throw new GenerationFailure(stage, `${generator.description} returned empty output.`, scope);
  }
  return output;
}
