import { z } from "zod";

import { ConfigError, UserInputError } from "./errors.js";
import type { AiProvider } from "./types.js";

export const DEFAULT_MODEL_SPEC = "ollama/llama3.1:8b";
export const DEFAULT_OLLAMA_BASE_URL = "http://localhost:11434/v1";
export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

const DEFAULT_AI_TIMEOUT_SEC = 300;
const MIN_AI_TIMEOUT_SEC = 10;
const MAX_AI_TIMEOUT_SEC = 60 * 60;

const AI_PROVIDERS = ["auto", "openai", "codex", "claude"] as const satisfies readonly AiProvider[];

export interface GenerationConfig {
  provider: AiProvider;
  model: string | undefined;
  baseUrl: string | undefined;
  apiKey: string | undefined;
  timeoutMs: number;
}

export interface ModelSpec {
  provider: AiProvider;
  model: string | undefined;
  baseUrl: string | undefined;
}

export interface ResolveGenerationConfigOptions {
  env?: NodeJS.ProcessEnv | undefined;
  provider?: string | undefined;
  model?: string | undefined;
  aiTimeoutSec?: number | string | undefined;
}

const optionalText = z.preprocess(
  (value) => (typeof value === "string" && value.trim().length === 0 ? undefined : value),
  z.string().trim().optional()
);

const optionalUrl = z.preprocess(
  (value) => (typeof value === "string" && value.trim().length === 0 ? undefined : value),
  z.string().trim().url().optional()
);

const environmentSchema = z.object({
  STAKEHOLDER_MODEL: optionalText,
  OPENAI_API_KEY: optionalText,
  OPENAI_BASE_URL: optionalUrl,
  OLLAMA_BASE_URL: optionalUrl
});

type GenerationEnvironment = z.infer<typeof environmentSchema>;

function readEnvironment(env: NodeJS.ProcessEnv): GenerationEnvironment {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join(".") ?? "environment";
    throw new ConfigError(`Invalid ${key}: ${issue?.message ?? "unrecognized value"}.`, {
      details: { issues: parsed.error.issues.map((entry) => entry.path.join(".")) }
    });
  }
  return parsed.data;
}

export function normalizeProvider(value: string | undefined): AiProvider | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  const match = AI_PROVIDERS.find((provider) => provider === normalized);
  if (!match) {
    throw new UserInputError(`Invalid --provider value "${value}". Expected one of: ${AI_PROVIDERS.join(", ")}.`);
  }
  return match;
}

export function normalizeAiTimeoutMs(value: number | string | undefined): number {
  if (value === undefined) return DEFAULT_AI_TIMEOUT_SEC * 1000;
  const parsed =
    typeof value === "number" && Number.isFinite(value)
      ? Math.floor(value)
      : typeof value === "string" && value.trim().length > 0
        ? Number.parseInt(value, 10)
        : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw new UserInputError(
      `Invalid --ai-timeout-sec value "${String(value)}". Expected an integer between ${MIN_AI_TIMEOUT_SEC} and ${MAX_AI_TIMEOUT_SEC}.`
    );
  }
  const clamped = Math.min(MAX_AI_TIMEOUT_SEC, Math.max(MIN_AI_TIMEOUT_SEC, parsed));
  return clamped * 1000;
}

/**
 * Reads `<provider>/<model>` specs such as `ollama/llama3.1:8b`, `openai/gpt-4o-mini`,
 * `codex`, or `claude/sonnet`. Anything without a known prefix is a model id for `auto`.
 */
export function parseModelSpec(spec: string, env: GenerationEnvironment = {}): ModelSpec {
  const trimmed = spec.trim();
  if (!trimmed) {
    throw new ConfigError("Model spec is empty. Set STAKEHOLDER_MODEL like `ollama/llama3.1:8b`.");
  }

  const slash = trimmed.indexOf("/");
  const prefix = (slash === -1 ? trimmed : trimmed.slice(0, slash)).toLowerCase();
  const rest = slash === -1 ? "" : trimmed.slice(slash + 1).trim();

  switch (prefix) {
    case "ollama":
      if (!rest) throw new ConfigError(`Model spec "${trimmed}" names no Ollama model.`);
      return { provider: "openai", model: rest, baseUrl: env.OLLAMA_BASE_URL ?? DEFAULT_OLLAMA_BASE_URL };
    case "openai":
      return { provider: "openai", model: rest || undefined, baseUrl: undefined };
    case "codex":
    case "claude":
    case "auto":
      return { provider: prefix, model: rest || undefined, baseUrl: undefined };
    default:
      return { provider: "auto", model: trimmed, baseUrl: undefined };
  }
}

export function resolveGenerationConfig(options: ResolveGenerationConfigOptions = {}): Readonly<GenerationConfig> {
  const env = readEnvironment(options.env ?? process.env);
  const spec = parseModelSpec(env.STAKEHOLDER_MODEL ?? DEFAULT_MODEL_SPEC, env);
  const requestedProvider = normalizeProvider(options.provider);
  const flagModel = options.model?.trim() || undefined;

  const keepSpec = requestedProvider === undefined || requestedProvider === spec.provider;
  const provider = requestedProvider ?? spec.provider;
  const model = flagModel ?? (keepSpec ? spec.model : undefined);
  const specBaseUrl = keepSpec ? spec.baseUrl : undefined;
  const baseUrl =
    provider === "openai" || provider === "auto"
      ? (specBaseUrl ?? env.OPENAI_BASE_URL ?? (env.OPENAI_API_KEY ? DEFAULT_OPENAI_BASE_URL : undefined))
      : undefined;

  return Object.freeze({
    provider,
    model,
    baseUrl,
    apiKey: env.OPENAI_API_KEY,
    timeoutMs: normalizeAiTimeoutMs(options.aiTimeoutSec)
  });
}
