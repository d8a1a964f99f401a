import { intro, log, note, outro, spinner } from "@clack/prompts";

import { createTextGenerator } from "../core/ai/generator.js";
import { resolveGenerationConfig } from "../core/config.js";
import { normalizeOutputFormat } from "../core/errors.js";
import { runPanel } from "../core/panel/orchestrator.js";
import { readPitch } from "../core/pitch.js";
import type { GrillCommandOptions, PanelResult } from "../core/types.js";
import { buildJsonReport, describeState, formatScoreLine } from "./grill/report.js";

export async function runGrill(options: GrillCommandOptions): Promise<PanelResult> {
  const format = normalizeOutputFormat(options.format);
  const config = resolveGenerationConfig({
    provider: options.provider,
    model: options.model,
    aiTimeoutSec: options.aiTimeoutSec
  });

  const pitch = await readPitch({
    pitch: options.pitch,
    file: options.file,
    onInteractive() {
      if (format === "text") log.message("Enter your pitch (Ctrl+D when done):");
    }
  });
  const generator = createTextGenerator(config);
  const concurrency = options.sequential ? 1 : undefined;

  if (format === "json") {
    const result = await runPanel(pitch, { generator, concurrency });
    process.stdout.write(`${JSON.stringify(buildJsonReport(result, generator.description), null, 2)}\n`);
    return result;
  }

  intro("pitch-grill: stakeholder rehearsal");
  log.info(`Panel model: ${generator.description}`);

  const panelSpinner = spinner({ indicator: "dots" });
  panelSpinner.start(describeState("idle"));
  let lastStatus = "";
  let result: PanelResult;
  try {
    result = await runPanel(pitch, {
      generator,
      concurrency,
      onStateChange(state) {
        panelSpinner.message(describeState(state));
      },
      onStatus(message) {
        if (message === lastStatus) return;
        lastStatus = message;
        panelSpinner.message(message);
      }
    });
  } catch (error) {
    panelSpinner.stop(describeState("failed"), 1);
    throw error;
  }
  panelSpinner.stop("Stakeholder panel finished.");

  for (const entry of result.transcript) {
    note(entry.text, `${entry.label} Questions`);
  }
  note(result.assessment.text, "Readiness Assessment");
  log.step(formatScoreLine(result.assessment));
  outro("Grilling session complete! Use this feedback to strengthen your pitch.");
  return result;
}
