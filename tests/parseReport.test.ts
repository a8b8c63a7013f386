import { afterEach, describe, expect, it } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { DEFAULT_PARSER_CONFIG } from "../src/config/parserConfig";
import { parsePublications } from "../src/extract/parsePublications";
import { summarizeOutcomes } from "../src/extract/summary";
import {
  assertValidParseReport,
  buildParseReport,
  readParseReport,
  writeParseReport
} from "../src/io/parseReport";

const tempDirs: string[] = [];

function tempDir(): string {
  const dir = mkdtempSync(path.join(os.tmpdir(), "pubpaste-report-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

function sampleReport() {
  const text = readFileSync(path.join(process.cwd(), "fixtures", "publications_sample.txt"), "utf8");
  return buildParseReport({
    source: "fixtures/publications_sample.txt",
    format: "text",
    config: DEFAULT_PARSER_CONFIG,
    outcomes: parsePublications(text),
    generatedAt: "2026-01-05T10:00:00Z"
  });
}

describe("Outcome summary", () => {
  it("counts outcomes by kind, reason and quartile", () => {
    expect(sampleReport().summary).toEqual({
      total: 17,
      extracted: 16,
      skipped: 1,
      skipped_by_reason: { MISSING_TITLE: 0, MISSING_QUARTILE: 1 },
      by_quartile: { Q1: 5, Q2: 5, Q3: 4, Q4: 2 },
      year_min: 2015,
      year_max: 2023
    });
  });

  it("reports no year span for an empty list", () => {
    expect(summarizeOutcomes([])).toEqual({
      total: 0,
      extracted: 0,
      skipped: 0,
      skipped_by_reason: { MISSING_TITLE: 0, MISSING_QUARTILE: 0 },
      by_quartile: { Q1: 0, Q2: 0, Q3: 0, Q4: 0 },
      year_min: null,
      year_max: null
    });
  });
});

describe("Parse report", () => {
  it("builds a report that satisfies the contract", async () => {
    const report = sampleReport();
    expect(report.schema_version).toBe("1.0");
    expect(report.generated_at).toBe("2026-01-05T10:00:00Z");
    await expect(assertValidParseReport(report, "Parse report")).resolves.toBeUndefined();
  });

  it("accepts an empty report", async () => {
    const report = buildParseReport({
      source: "stdin",
      format: "text",
      config: DEFAULT_PARSER_CONFIG,
      outcomes: [],
      generatedAt: "2026-01-05T10:00:00Z"
    });
    await expect(assertValidParseReport(report, "Parse report")).resolves.toBeUndefined();
  });

  it("round-trips through a file", async () => {
    const report = sampleReport();
    const filePath = path.join(tempDir(), "nested", "report.json");

    await writeParseReport(filePath, report);
    await expect(readParseReport(filePath)).resolves.toEqual(report);
  });

  it("rejects a report with an unknown skip reason", async () => {
    const report = {
      ...sampleReport(),
      outcomes: [{ kind: "skipped", year: 2020, reason: "MISSING_YEAR" }]
    };
    const filePath = path.join(tempDir(), "bad.json");
    writeFileSync(filePath, JSON.stringify(report), "utf8");

    await expect(readParseReport(filePath)).rejects.toThrow(
      `Parse report ${filePath} failed schema validation`
    );
  });

  it("rejects an extracted record with a short title", async () => {
    const report = {
      ...sampleReport(),
      outcomes: [{ kind: "extracted", title: "Too short", year: 2020, quartile: "Q1" }]
    };
    await expect(assertValidParseReport(report, "Parse report")).rejects.toThrow(
      "Parse report failed schema validation"
    );
  });
});
