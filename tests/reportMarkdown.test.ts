import { describe, expect, it } from "vitest";
import { DEFAULT_PARSER_CONFIG } from "../src/config/parserConfig";
import { buildParseReport } from "../src/io/parseReport";
import { buildReportMarkdown } from "../src/commands/report";
import { formatSummaryLine } from "../src/commands/parse";
import { PublicationOutcome } from "../src/types/publication";

const outcomes: PublicationOutcome[] = [
  {
    kind: "extracted",
    title: "Secure firmware updates for medical devices",
    year: 2022,
    quartile: "Q1"
  },
  { kind: "skipped", year: 2021, reason: "MISSING_TITLE" },
  {
    kind: "extracted",
    title: "Graph based routing for vehicular networks",
    year: 2020,
    quartile: "Q3"
  }
];

function report(items: PublicationOutcome[]) {
  return buildParseReport({
    source: "paste.txt",
    format: "text",
    config: DEFAULT_PARSER_CONFIG,
    outcomes: items,
    generatedAt: "2026-01-05T10:00:00Z"
  });
}

describe("Markdown report", () => {
  it("lists extracted and skipped publications in order", () => {
    expect(buildReportMarkdown(report(outcomes)).split("\n")).toEqual([
      "# Publication Import (paste.txt)",
      "",
      "## Summary",
      "",
      "- generated_at: 2026-01-05T10:00:00Z",
      "- total: 3 | extracted: 2 | skipped: 1",
      "- quartiles: Q1 1 | Q2 0 | Q3 1 | Q4 0",
      "- years: 2020-2022",
      "",
      "## Extracted",
      "",
      "- 2022 | Q1 | Secure firmware updates for medical devices",
      "- 2020 | Q3 | Graph based routing for vehicular networks",
      "",
      "## Skipped",
      "",
      "- 2021 | MISSING_TITLE"
    ]);
  });

  it("omits the skipped section when nothing was skipped", () => {
    const md = buildReportMarkdown(report([outcomes[0]]));
    expect(md.split("\n")).not.toContain("## Skipped");
    expect(md.split("\n")).toContain("- years: 2022");
  });

  it("shows n/a for the year span of an empty report", () => {
    expect(buildReportMarkdown(report([])).split("\n")).toContain("- years: n/a");
  });
});

describe("Summary line", () => {
  it("counts extracted records and skip reasons", () => {
    expect(formatSummaryLine(report(outcomes).summary)).toBe(
      "Extracted 2 of 3 publications (skipped 1: MISSING_TITLE=1, MISSING_QUARTILE=0)"
    );
  });
});
