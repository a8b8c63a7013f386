#!/usr/bin/env node
import dotenv from "dotenv";
import { Command, InvalidArgumentError } from "commander";
import pkg from "../../package.json";
import { runParse } from "../commands/parse";
import { runReport } from "../commands/report";
import { runPersistCommand } from "../commands/persist";
import { isPublicationType, PUBLICATION_TYPES, PublicationType } from "../db/insertPublications";
import { defaultEnvPath } from "../io/paths";
import { SOURCE_FORMATS, SourceFormat, isSourceFormat } from "../text/sourceText";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.PUBPASTE_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function parseFacultyId(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    throw new InvalidArgumentError("Faculty id must be a positive integer.");
  }
  return id;
}

function parseFormat(value: string): SourceFormat {
  if (!isSourceFormat(value)) {
    throw new InvalidArgumentError(`Expected one of: ${SOURCE_FORMATS.join(", ")}.`);
  }
  return value;
}

function parseType(value: string): PublicationType {
  if (!isPublicationType(value)) {
    throw new InvalidArgumentError(`Expected one of: ${PUBLICATION_TYPES.join(", ")}.`);
  }
  return value;
}

const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath());
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("pubpaste")
  .description("Extract publication records (title, year, quartile) from pasted publication lists")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides PUBPASTE_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("parse")
  .description("Parse a pasted publication list into a parse report")
  .requiredOption("--in <path>", "Input file with the pasted block, or - for stdin")
  .option(
    "--format <format>",
    `Input format (${SOURCE_FORMATS.join(", ")}); defaults from the file extension`,
    parseFormat
  )
  .option("--config <path>", "Parser config JSON (year range, metadata prefixes)")
  .option("--out <path>", "Output path for the parse report. If omitted, logs to stdout.")
  .action(async (opts) => {
    await runParse({
      inputPath: opts.in,
      format: opts.format,
      configPath: opts.config,
      outPath: opts.out
    });
  });

program
  .command("report")
  .description("Render a parse report as markdown")
  .requiredOption("--report <path>", "Parse report JSON")
  .option("--out <path>", "Output markdown path. If omitted, logs to stdout.")
  .action(async (opts) => {
    await runReport({ reportPath: opts.report, outPath: opts.out });
  });

program
  .command("persist")
  .description("Store the extracted publications of a parse report in the database")
  .requiredOption("--report <path>", "Parse report JSON")
  .requiredOption("--faculty-id <id>", "Faculty member the publications belong to", parseFacultyId)
  .option("--type <type>", `Publication type (${PUBLICATION_TYPES.join(", ")})`, parseType)
  .action(async (opts) => {
    await runPersistCommand({
      reportPath: opts.report,
      facultyId: opts.facultyId,
      type: opts.type
    });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
