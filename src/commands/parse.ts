import path from "path";
import { loadParserConfig } from "../config/parserConfig";
import { parsePublications } from "../extract/parsePublications";
import { buildParseReport, writeParseReport, assertValidParseReport } from "../io/parseReport";
import { inferSourceFormat, readSourceText, SourceFormat } from "../text/sourceText";
import { OutcomeSummary } from "../extract/summary";

export interface ParseOptions {
  inputPath: string;
  format?: SourceFormat;
  configPath?: string;
  outPath?: string;
}

export function formatSummaryLine(summary: OutcomeSummary): string {
  const reasons = `MISSING_TITLE=${summary.skipped_by_reason.MISSING_TITLE}, MISSING_QUARTILE=${summary.skipped_by_reason.MISSING_QUARTILE}`;
  return `Extracted ${summary.extracted} of ${summary.total} publications (skipped ${summary.skipped}: ${reasons})`;
}

export async function runParse(options: ParseOptions): Promise<void> {
  const format = options.format ?? inferSourceFormat(options.inputPath);
  const config = await loadParserConfig(options.configPath);
  const text = await readSourceText(options.inputPath, format);

  const outcomes = parsePublications(text, config);
  const report = buildParseReport({
    source: options.inputPath === "-" ? "stdin" : options.inputPath,
    format,
    config,
    outcomes
  });

  if (options.outPath) {
    const outPath = path.resolve(options.outPath);
    await writeParseReport(outPath, report);
    console.log(`Wrote parse report to ${outPath}`);
    console.log(formatSummaryLine(report.summary));
  } else {
    await assertValidParseReport(report, "Parse report");
    console.log(JSON.stringify(report, null, 2));
  }
}
