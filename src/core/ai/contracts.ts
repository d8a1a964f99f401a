export interface CommandResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  reason?: string;
}

export type StatusCallback = (message: string) => void;

export interface GenerateOptions {
  signal?: AbortSignal | undefined;
  onStatus?: StatusCallback | undefined;
}

/**
 * Black-box text generation: one prompt in, one block of text out.
 * Implementations reject on transport or model errors.
 */
export interface TextGenerator {
  readonly description: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}
