import type { OutputFormat, PersonaRole } from "./types.js";

const EXIT_CODE_OPERATIONAL_FAILURE = 1;
const EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE = 2;

interface PanelErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export type GenerationStage = "questions" | "evaluation";

export class PanelError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, exitCode: number, options: PanelErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

export class UserInputError extends PanelError {
  constructor(message: string, options: PanelErrorOptions = {}, code = "USER_INPUT") {
    super(message, code, EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

/** Empty or whitespace-only pitch. Raised before any generation call. */
export class InvalidInputError extends UserInputError {
  constructor(message = "No pitch provided. Use --pitch, --file, or pipe the pitch on stdin.") {
    super(message, {}, "INVALID_INPUT");
  }
}

export class ConfigError extends PanelError {
  constructor(message: string, options: PanelErrorOptions = {}) {
    super(message, "CONFIG", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class ExecutionError extends PanelError {
  constructor(message: string, options: PanelErrorOptions = {}, code = "EXECUTION") {
    super(message, code, EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

export class GenerationFailure extends ExecutionError {
  readonly stage: GenerationStage;
  readonly persona: PersonaRole | undefined;

  constructor(stage: GenerationStage, reason: string, options: { persona?: PersonaRole; cause?: unknown } = {}) {
    const scope = options.persona ? `${stage} stage (${options.persona})` : `${stage} stage`;
    super(
      `Generation failed in ${scope}: ${reason}`,
      {
        ...(options.cause !== undefined ? { cause: options.cause } : {}),
        details: {
          stage,
          ...(options.persona ? { persona: options.persona } : {})
        }
      },
      "GENERATION_FAILURE"
    );
    this.stage = stage;
    this.persona = options.persona;
  }
}

export class RunCancelledError extends ExecutionError {
  constructor(message = "Panel run was cancelled.", options: PanelErrorOptions = {}) {
    super(message, options, "CANCELLED");
  }
}

export class PanelStateError extends ExecutionError {
  constructor(message: string) {
    super(message, {}, "PANEL_STATE");
  }
}

function isCommanderErrorLike(error: unknown): error is { code?: unknown; message?: unknown } {
  if (!error || typeof error !== "object") return false;
  if (!("code" in error)) return false;
  return typeof (error as { code?: unknown }).code === "string";
}

export function normalizeError(error: unknown): PanelError {
  if (error instanceof PanelError) return error;
  if (isCommanderErrorLike(error) && String(error.code).startsWith("commander.")) {
    const message = error instanceof Error ? error.message : String(error.message ?? error.code);
    return new UserInputError(message, {
      cause: error,
      details: {
        commanderCode: String(error.code)
      }
    });
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, { cause: error });
  }
  return new ExecutionError(String(error));
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

export function normalizeOutputFormat(value: string | undefined): OutputFormat {
  const normalized = value?.trim().toLowerCase() ?? "text";
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new UserInputError(`Invalid --format value "${String(value)}". Expected "text" or "json".`);
}

export function resolveOutputFormatFromArgv(argv: string[]): OutputFormat {
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) continue;
    if (token === "--format") {
      const next = argv[index + 1];
      return next?.trim().toLowerCase() === "json" ? "json" : "text";
    }
    if (!token.startsWith("--format=")) continue;
    return token.slice("--format=".length).trim().toLowerCase() === "json" ? "json" : "text";
  }
  return "text";
}

export function toJsonErrorPayload(error: PanelError): Record<string, unknown> {
  return {
    error: {
      code: error.code,
      type: error.name,
      message: error.message,
      exitCode: error.exitCode,
      ...(error.details ? { details: error.details } : {})
    }
  };
}
