import { ParserConfig } from "../config/parserConfig";
import { summarizeOutcomes } from "../extract/summary";
import { SourceFormat } from "../text/sourceText";
import { ParseReport } from "../types/parseReport";
import { PublicationOutcome } from "../types/publication";
import { readJson, writeJson } from "../utils/fs";
import { nowUtcIsoSeconds } from "../utils/time";
import { assertValidSchema, getContractValidator } from "../validation/jsonSchema";

export interface ParseReportParams {
  source: string;
  format: SourceFormat;
  config: ParserConfig;
  outcomes: PublicationOutcome[];
  generatedAt?: string;
}

export function buildParseReport(params: ParseReportParams): ParseReport {
  return {
    schema_version: "1.0",
    source: params.source,
    format: params.format,
    generated_at: params.generatedAt ?? nowUtcIsoSeconds(),
    config: params.config,
    summary: summarizeOutcomes(params.outcomes),
    outcomes: params.outcomes
  };
}

export async function assertValidParseReport(report: unknown, label: string): Promise<void> {
  const validator = await getContractValidator("parse_report");
  assertValidSchema(validator, report, label);
}

export async function writeParseReport(filePath: string, report: ParseReport): Promise<void> {
  await assertValidParseReport(report, "Parse report");
  await writeJson(filePath, report);
}

export async function readParseReport(filePath: string): Promise<ParseReport> {
  const report = await readJson<ParseReport>(filePath);
  await assertValidParseReport(report, `Parse report ${filePath}`);
  return report;
}
