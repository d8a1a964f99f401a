import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { Readable } from "node:stream";

import { InvalidInputError, UserInputError } from "./errors.js";

export interface ReadPitchOptions {
  pitch?: string | undefined;
  file?: string | undefined;
  cwd?: string | undefined;
  stdin?: (Readable & { isTTY?: boolean }) | undefined;
  /** Called before waiting on an interactive terminal. */
  onInteractive?: (() => void) | undefined;
}

export function assertPitch(text: string | undefined): asserts text is string {
  if (typeof text !== "string" || text.trim().length === 0) {
    throw new InvalidInputError();
  }
}

async function readStream(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), "utf8"));
  }
  return Buffer.concat(chunks).toString("utf8");
}

/** Pitch text from --file, then --pitch, then stdin. Rejects blank text. */
export async function readPitch(options: ReadPitchOptions = {}): Promise<string> {
  let text: string;
  if (options.file) {
    const path = resolve(options.cwd ?? process.cwd(), options.file);
    try {
      text = await readFile(path, "utf8");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new UserInputError(`Could not read pitch file ${path}: ${reason}`, { cause: error });
    }
  } else if (options.pitch !== undefined) {
    text = options.pitch;
  } else {
    const stdin = options.stdin ?? process.stdin;
    if (stdin.isTTY) options.onInteractive?.();
    text = await readStream(stdin);
  }

  assertPitch(text);
  return text;
}
