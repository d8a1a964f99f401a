import type { StatusCallback, TextGenerator } from "../ai/contracts.js";
import { ConfigError, PanelStateError } from "../errors.js";
import { listPersonas } from "../personas.js";
import { assertPitch } from "../pitch.js";
import type { PanelResult, Persona, QuestionSet, RunState } from "../types.js";
import { aggregate } from "./aggregate.js";
import { evaluate } from "./evaluation.js";
import { generateQuestions } from "./questions.js";

export type StateChangeCallback = (state: RunState, previous: RunState) => void;

export interface PanelRunOptions {
  generator: TextGenerator;
  personas?: readonly Persona[] | undefined;
  /** How many persona calls may be in flight at once. 1 runs them one after another. */
  concurrency?: number | undefined;
  signal?: AbortSignal | undefined;
  timeoutMs?: number | undefined;
  onStatus?: StatusCallback | undefined;
  onStateChange?: StateChangeCallback | undefined;
}

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  idle: ["generating-questions"],
  "generating-questions": ["aggregating", "failed"],
  aggregating: ["evaluating", "failed"],
  evaluating: ["done", "failed"],
  done: [],
  failed: []
};

function checkPanel(personas: readonly Persona[]): readonly Persona[] {
  if (personas.length === 0) {
    throw new ConfigError("A panel needs at least one persona.");
  }
  const seen = new Set<string>();
  for (const persona of personas) {
    if (seen.has(persona.role)) {
      throw new ConfigError(`Persona "${persona.role}" appears more than once in the panel.`);
    }
    seen.add(persona.role);
  }
  return personas;
}

/**
 * One pass of the stakeholder panel over a single pitch:
 * questions from every persona, then the aggregate, then the evaluation.
 * A run is used once; create another for the next pitch.
 */
export class PanelRun {
  private readonly generator: TextGenerator;
  private readonly personas: readonly Persona[];
  private readonly concurrency: number;
  private readonly options: PanelRunOptions;
  private current: RunState = "idle";
  private readonly visited: RunState[] = ["idle"];

  constructor(options: PanelRunOptions) {
    this.options = options;
    this.generator = options.generator;
    this.personas = checkPanel(options.personas ?? listPersonas());
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? this.personas.length));
  }

  get state(): RunState {
    return this.current;
  }

  get states(): readonly RunState[] {
    return [...this.visited];
  }

  async run(pitch: string): Promise<PanelResult> {
    if (this.current !== "idle") {
      throw new PanelStateError(`Panel run already ${this.current}; create a new PanelRun for another pitch.`);
    }
    assertPitch(pitch);

    const controller = new AbortController();
    const signal = this.combineSignals(controller.signal);

    try {
      this.transition("generating-questions");
      const transcript = await this.collectQuestions(pitch, signal);

      this.transition("aggregating");
      const composite = aggregate(transcript);

      this.transition("evaluating");
      this.options.onStatus?.("Calculating your readiness score...");
      const assessment = await evaluate(pitch, composite, this.generator, {
        signal,
        onStatus: this.options.onStatus
      });

      this.transition("done");
      return { transcript, composite, assessment, states: [...this.visited] };
    } catch (error) {
      controller.abort(error);
      this.transition("failed");
      throw error;
    }
  }

  private combineSignals(internal: AbortSignal): AbortSignal {
    const signals = [internal];
    if (this.options.signal) signals.push(this.options.signal);
    if (typeof this.options.timeoutMs === "number") signals.push(AbortSignal.timeout(this.options.timeoutMs));
    return signals.length === 1 ? internal : AbortSignal.any(signals);
  }

  private async collectQuestions(pitch: string, signal: AbortSignal): Promise<QuestionSet[]> {
    const out: QuestionSet[] = [];
    for (let i = 0; i < this.personas.length; i += this.concurrency) {
      const batch = this.personas.slice(i, i + this.concurrency);
      const sets = await Promise.all(batch.map((persona) => this.askPersona(pitch, persona, signal)));
      out.push(...sets);
    }
    return out;
  }

  private async askPersona(pitch: string, persona: Persona, signal: AbortSignal): Promise<QuestionSet> {
    this.options.onStatus?.(`${persona.title} is reviewing the pitch...`);
    const questions = await generateQuestions(pitch, persona, this.generator, {
      signal,
      onStatus: this.options.onStatus
    });
    this.options.onStatus?.(`${persona.title} questions received.`);
    return questions;
  }

  private transition(next: RunState): void {
    const previous = this.current;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new PanelStateError(`Illegal panel transition ${previous} -> ${next}.`);
    }
    this.current = next;
    this.visited.push(next);
    this.options.onStateChange?.(next, previous);
  }
}

export function runPanel(pitch: string, options: PanelRunOptions): Promise<PanelResult> {
  return new PanelRun(options).run(pitch);
}
