import { z } from "zod";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface ChatCompletion {
  content: string;
  tokens: number;
}

export interface ChatCompletionsClientOptions {
  baseUrl: string;
  apiKey?: string | undefined;
  timeoutMs?: number | undefined;
  maxAttempts?: number | undefined;
  baseDelayMs?: number | undefined;
}

export interface CompleteOptions {
  temperature?: number | undefined;
  signal?: AbortSignal | undefined;
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() })
      })
    )
    .min(1),
  usage: z.object({ total_tokens: z.number().optional() }).optional()
});

export class ChatRequestError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "ChatRequestError";
    this.status = status;
  }
}

function isTransient(error: unknown): boolean {
  if (error instanceof ChatRequestError) {
    return error.status === 429 || (typeof error.status === "number" && error.status >= 500);
  }
  return error instanceof TypeError;
}

function delay(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** OpenAI-compatible `/chat/completions` client; also serves Ollama's `/v1` endpoint. */
export class ChatCompletionsClient {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;

  constructor(options: ChatCompletionsClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.baseDelayMs = options.baseDelayMs ?? 1000;
  }

  get endpoint(): string {
    return `${this.baseUrl}/chat/completions`;
  }

  async complete(model: string, messages: ChatMessage[], options: CompleteOptions = {}): Promise<ChatCompletion> {
    const body: { model: string; messages: ChatMessage[]; temperature?: number } = { model, messages };
    if (shouldSendTemperature(model, options.temperature)) {
      body.temperature = options.temperature;
    }

    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        return await this.send(body, options.signal);
      } catch (error) {
        lastError = error;
        if (options.signal?.aborted || !isTransient(error) || attempt === this.maxAttempts) {
          throw error;
        }
        await delay(this.baseDelayMs * 2 ** (attempt - 1), options.signal);
      }
    }
    throw lastError;
  }

  private async send(body: object, signal: AbortSignal | undefined): Promise<ChatCompletion> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const response = await fetch(this.endpoint, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout
    });

    if (!response.ok) {
      const detail = await response.text();
      throw new ChatRequestError(`Chat request failed (${response.status}): ${detail.slice(0, 280)}`, response.status);
    }

    const parsed = completionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ChatRequestError("Chat response did not include choices[0].message.content.");
    }

    const [first] = parsed.data.choices;
    return {
      content: first?.message.content ?? "",
      tokens: parsed.data.usage?.total_tokens ?? 0
    };
  }
}

function shouldSendTemperature(model: string, temperature: number | undefined): temperature is number {
  if (typeof temperature !== "number" || Number.isNaN(temperature)) {
    return false;
  }
  const lower = model.toLowerCase();
  const noTempPrefixes = ["o1", "o3", "o4", "gpt-5"];
  return !noTempPrefixes.some((prefix) => lower.startsWith(prefix));
}
