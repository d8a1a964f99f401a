import { log, note } from "@clack/prompts";

import { EXAMPLE_PITCH } from "../core/example-pitch.js";

export function runExample(): void {
  note(EXAMPLE_PITCH.trimEnd(), "Example Pitch");
  log.info("Save this as example.md and run: pitch-grill grill --file example.md");
}
