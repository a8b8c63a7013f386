import path from "path";
import { readParseReport } from "../io/parseReport";
import { ParseReport } from "../types/parseReport";
import { writeText } from "../utils/fs";

interface ReportOptions {
  reportPath: string;
  outPath?: string;
}

function formatYearSpan(report: ParseReport): string {
  const { year_min, year_max } = report.summary;
  if (year_min === null || year_max === null) return "n/a";
  return year_min === year_max ? String(year_min) : `${year_min}-${year_max}`;
}

export function buildReportMarkdown(report: ParseReport): string {
  const { summary } = report;
  const lines: string[] = [];
  lines.push(`# Publication Import (${report.source})`);
  lines.push("");
  lines.push("## Summary");
  lines.push("");
  lines.push(`- generated_at: ${report.generated_at}`);
  lines.push(`- total: ${summary.total} | extracted: ${summary.extracted} | skipped: ${summary.skipped}`);
  lines.push(
    `- quartiles: Q1 ${summary.by_quartile.Q1} | Q2 ${summary.by_quartile.Q2} | Q3 ${summary.by_quartile.Q3} | Q4 ${summary.by_quartile.Q4}`
  );
  lines.push(`- years: ${formatYearSpan(report)}`);
  lines.push("");

  lines.push("## Extracted");
  lines.push("");
  for (const outcome of report.outcomes) {
    if (outcome.kind !== "extracted") continue;
    lines.push(`- ${outcome.year} | ${outcome.quartile} | ${outcome.title}`);
  }

  if (summary.skipped > 0) {
    lines.push("");
    lines.push("## Skipped");
    lines.push("");
    for (const outcome of report.outcomes) {
      if (outcome.kind !== "skipped") continue;
      lines.push(`- ${outcome.year} | ${outcome.reason}`);
    }
  }

  return lines.join("\n");
}

export async function runReport(opts: ReportOptions): Promise<void> {
  const report = await readParseReport(path.resolve(opts.reportPath));
  const md = buildReportMarkdown(report);

  if (opts.outPath) {
    await writeText(opts.outPath, md);
    console.log(`Wrote report to ${opts.outPath}`);
  } else {
    console.log(md);
  }
}
