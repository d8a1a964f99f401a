import type { GenerationConfig } from "../config.js";
import { ConfigError, ExecutionError, RunCancelledError } from "../errors.js";
import { ChatCompletionsClient } from "./chat-client.js";
import type { GenerateOptions, TextGenerator } from "./contracts.js";
import { chooseProvider, hasBinary } from "./provider-selection.js";
import type { BinaryProbe, ResolvedAiProvider } from "./provider-selection.js";
import { runCliPrompt, summarizeFailure } from "./providers.js";
import type { CliProvider } from "./providers.js";
import { runWithLiveStatus } from "./status.js";

const PANEL_SYSTEM_PROMPT =
  "You are a member of a product leadership panel rehearsing a roadmap review. " +
  "Stay in the role you are given and answer in plain markdown.";

const DEFAULT_CHAT_MODEL = "gpt-4o-mini";

function throwIfAborted(signal: AbortSignal | undefined, label: string): void {
  if (signal?.aborted) {
    throw new RunCancelledError(`Request to ${label} was cancelled.`, { cause: signal.reason });
  }
}

export class CliTextGenerator implements TextGenerator {
  readonly description: string;

  constructor(
    private readonly provider: CliProvider,
    private readonly config: Pick<GenerationConfig, "model" | "timeoutMs">,
    private readonly cwd?: string
  ) {
    this.description = `${provider}${config.model ? ` (${config.model})` : ""}`;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const result = await runWithLiveStatus(this.description, options.onStatus, () =>
      runCliPrompt(this.provider, prompt, {
        cwd: this.cwd,
        model: this.config.model,
        timeoutMs: this.config.timeoutMs,
        signal: options.signal,
        onStatus: options.onStatus
      })
    );

    throwIfAborted(options.signal, this.description);
    if (!result.ok) {
      throw new ExecutionError(`Could not get output from ${this.description} (${summarizeFailure(result)}).`);
    }
    return result.stdout;
  }
}

export class ChatTextGenerator implements TextGenerator {
  readonly description: string;
  private readonly model: string;

  constructor(
    private readonly client: ChatCompletionsClient,
    model: string | undefined
  ) {
    this.model = model ?? DEFAULT_CHAT_MODEL;
    this.description = `${this.model} at ${client.endpoint}`;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    try {
      const completion = await runWithLiveStatus(this.model, options.onStatus, () =>
        this.client.complete(
          this.model,
          [
            { role: "system", content: PANEL_SYSTEM_PROMPT },
            { role: "user", content: prompt }
          ],
          { temperature: 0.7, signal: options.signal }
        )
      );
      return completion.content;
    } catch (error) {
      throwIfAborted(options.signal, this.description);
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExecutionError(`Could not get output from ${this.description} (${reason}).`, { cause: error });
    }
  }
}

export interface CreateTextGeneratorOptions {
  cwd?: string | undefined;
  probe?: BinaryProbe | undefined;
}

export function resolveProvider(config: GenerationConfig, probe: BinaryProbe = hasBinary): ResolvedAiProvider {
  const provider = chooseProvider(config, probe);
  if (provider) return provider;

  if (config.provider === "openai") {
    throw new ConfigError("The openai provider needs OPENAI_BASE_URL or OPENAI_API_KEY (or an ollama/<model> spec).");
  }
  if (config.provider === "codex" || config.provider === "claude") {
    throw new ConfigError(`The \`${config.provider}\` CLI was not found on PATH.`);
  }
  throw new ConfigError(
    "No text generator available: install the `codex` or `claude` CLI, or set OPENAI_API_KEY / STAKEHOLDER_MODEL."
  );
}

export function createTextGenerator(
  config: GenerationConfig,
  options: CreateTextGeneratorOptions = {}
): TextGenerator {
  const provider = resolveProvider(config, options.probe);
  if (provider !== "openai") {
    return new CliTextGenerator(provider, config, options.cwd);
  }

  const client = new ChatCompletionsClient({
    baseUrl: config.baseUrl ?? "",
    apiKey: config.apiKey,
    timeoutMs: config.timeoutMs
  });
  return new ChatTextGenerator(client, config.model);
}
