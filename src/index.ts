import { Command, InvalidArgumentError } from "commander";

import { analyzeCommand, type AnalyzeCommandOptions } from "./cli/analyze.js";
import { catalogCheckCommand } from "./cli/catalog.js";
import { historyListCommand } from "./cli/history.js";
import { printError } from "./cli/output.js";
import type { InputFormat } from "./intake/parse.js";

const INPUT_FORMATS: readonly InputFormat[] = ["text", "csv", "json"];

// =============================================================================
// PROGRAM
// =============================================================================

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("transport-radar")
    .description("Classify transport objects, detect overlapping changes, and score collision risk")
    .option("--debug", "Show error codes, causes, and stack traces", false);

  program
    .command("analyze")
    .description("Analyze one change against the catalog and recent changes")
    .argument("<input>", "Object list (text, .csv, or .json)")
    .requiredOption("--change-id <id>", "Identifier of the change under review")
    .option("--catalog <path>", "Application catalog JSON")
    .option("--config <path>", "Config file (defaults to transport-radar.config.json lookup)")
    .option("--format <format>", "Input format: text, csv, or json", parseInputFormat)
    .option("--sibling <paths...>", "Object lists of other in-flight changes")
    .option(
      "--sibling-format <format>",
      "Format of the sibling files (default: inferred per file)",
      parseInputFormat,
    )
    .option("--window-days <days>", "Overlap window for stored changes", parsePositiveInt)
    .option("--no-history", "Do not read or write stored change history")
    .option("--out <path>", "Where to write the findings JSON")
    .option("--html <path>", "Also write an HTML tester checklist")
    .action(async (input: string, opts: AnalyzeCommandOptions) => {
      await analyzeCommand(input, opts);
    });

  const catalog = program.command("catalog").description("Application catalog tools");
  catalog
    .command("check")
    .description("Validate a catalog file and print a summary")
    .argument("<path>", "Catalog JSON path")
    .action(async (catalogPath: string) => {
      await catalogCheckCommand(catalogPath);
    });

  const history = program.command("history").description("Stored change history");
  history
    .command("list")
    .description("List stored changes")
    .option("--config <path>", "Config file")
    .action(async (opts: { config?: string }) => {
      await historyListCommand(opts);
    });

  return program;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildProgram();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    const debug = program.opts<{ debug?: boolean }>().debug === true;
    printError(err, debug ? "debug" : "short");
    process.exitCode = 1;
  }
}

// =============================================================================
// OPTION PARSERS
// =============================================================================

function parseInputFormat(value: string): InputFormat {
  const match = INPUT_FORMATS.find((format) => format === value.trim().toLowerCase());
  if (!match) {
    throw new InvalidArgumentError(`Expected one of ${INPUT_FORMATS.join(", ")}.`);
  }
  return match;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}
