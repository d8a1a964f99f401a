#!/usr/bin/env node
import { readFileSync } from "node:fs";

import { log } from "@clack/prompts";
import { Command } from "commander";
import { z } from "zod";

import { runExample } from "./commands/example.js";
import { runGrill } from "./commands/grill.js";
import { normalizeError, resolveOutputFormatFromArgv, toJsonErrorPayload } from "./core/errors.js";
import type { GrillCommandOptions } from "./core/types.js";

const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8")));

const program = new Command();
const CLI_VERSION = packageJson.version;

const ANSI = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  borderGray: "\u001B[38;5;245m",
  mutedGray: "\u001B[38;5;250m",
  white: "\u001B[97m",
  blue: "\u001B[38;5;39m"
} as const;

const COLOR_ENABLED = Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined && process.env.TERM !== "dumb";

function paint(text: string, ...codes: string[]): string {
  if (!COLOR_ENABLED || text.length === 0) return text;
  return `${codes.join("")}${text}${ANSI.reset}`;
}

function ellipsize(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return "";
  if (text.length <= maxWidth) return text;
  if (maxWidth <= 1) return "…";
  return `${text.slice(0, maxWidth - 1)}…`;
}

function renderBrandHeader(): void {
  const terminalWidth = process.stdout.columns ?? 80;
  const innerWidth = Math.min(64, Math.max(32, terminalWidth - 4));
  const rows = [
    { text: "pitch-grill", render: (text: string) => paint(text, ANSI.bold, ANSI.blue) },
    { text: "Flight simulator for product managers", render: (text: string) => paint(text, ANSI.white) },
    { text: `version ${CLI_VERSION}`, render: (text: string) => paint(text, ANSI.mutedGray) }
  ];

  const vertical = paint("│", ANSI.borderGray);
  console.log(paint(`╭${"─".repeat(innerWidth + 2)}╮`, ANSI.borderGray));
  for (const row of rows) {
    const fitted = ellipsize(row.text, innerWidth);
    const padding = " ".repeat(Math.max(0, innerWidth - fitted.length));
    console.log(`${vertical} ${row.render(fitted)}${padding} ${vertical}`);
  }
  console.log(paint(`╰${"─".repeat(innerWidth + 2)}╯`, ANSI.borderGray));
  console.log("");
}

program
  .name("pitch-grill")
  .description("Practice a roadmap pitch with tough AI stakeholders before the real meeting.")
  .version(CLI_VERSION);

program
  .command("grill")
  .description("Get grilled by the CEO, CTO, and Head of Design on your roadmap pitch.")
  .option("-p, --pitch <text>", "Your roadmap pitch text")
  .option("-f, --file <path>", "File containing your pitch")
  .option("--provider <provider>", "auto | openai | codex | claude (default from STAKEHOLDER_MODEL)")
  .option("--model <model>", "Model id for the selected provider")
  .option("--sequential", "Ask the stakeholders one at a time instead of in parallel", false)
  .option("--ai-timeout-sec <seconds>", "Timeout per AI call in seconds (default: 300)")
  .option("--format <format>", "text | json", "text")
  .action(async (rawOptions: GrillCommandOptions) => {
    if (resolveOutputFormatFromArgv(process.argv) === "text") renderBrandHeader();
    await runGrill(rawOptions);
  });

program
  .command("example")
  .description("Show an example pitch for testing.")
  .action(() => {
    runExample();
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const normalized = normalizeError(error);
    if (resolveOutputFormatFromArgv(process.argv) === "json") {
      process.stdout.write(`${JSON.stringify(toJsonErrorPayload(normalized), null, 2)}\n`);
    } else {
      log.error(normalized.message);
    }
    process.exitCode = normalized.exitCode;
  }
}

void main();
