import { PublicationOutcome, Quartile, SkipReason } from "../types/publication";

export interface OutcomeSummary {
  total: number;
  extracted: number;
  skipped: number;
  skipped_by_reason: Record<SkipReason, number>;
  by_quartile: Record<Quartile, number>;
  year_min: number | null;
  year_max: number | null;
}

export function summarizeOutcomes(outcomes: readonly PublicationOutcome[]): OutcomeSummary {
  const summary: OutcomeSummary = {
    total: outcomes.length,
    extracted: 0,
    skipped: 0,
    skipped_by_reason: { MISSING_TITLE: 0, MISSING_QUARTILE: 0 },
    by_quartile: { Q1: 0, Q2: 0, Q3: 0, Q4: 0 },
    year_min: null,
    year_max: null
  };

  for (const outcome of outcomes) {
    if (outcome.kind === "extracted") {
      summary.extracted += 1;
      summary.by_quartile[outcome.quartile] += 1;
    } else {
      summary.skipped += 1;
      summary.skipped_by_reason[outcome.reason] += 1;
    }
    summary.year_min = summary.year_min === null ? outcome.year : Math.min(summary.year_min, outcome.year);
    summary.year_max = summary.year_max === null ? outcome.year : Math.max(summary.year_max, outcome.year);
  }

  return summary;
}
