export const QUARTILES = ["Q1", "Q2", "Q3", "Q4"] as const;

export type Quartile = (typeof QUARTILES)[number];

export type SkipReason = "MISSING_TITLE" | "MISSING_QUARTILE";

export interface RawLine {
  readonly text: string;
  readonly index: number;
}

export type LineKind = "YEAR_ANCHOR" | "QUARTILE" | "METADATA" | "CONTENT";

export type ClassifiedLine =
  | { kind: "YEAR_ANCHOR"; line: RawLine; year: number }
  | { kind: "QUARTILE"; line: RawLine; quartile: Quartile }
  | { kind: "METADATA"; line: RawLine }
  | { kind: "CONTENT"; line: RawLine };

export interface Anchor {
  lineIndex: number;
  year: number;
}

/** Half-open range of line indices one anchor's scanners may read. */
export interface Window {
  anchor: Anchor;
  lowerBoundExclusive: number;
  upperBoundExclusive: number;
}

export interface ExtractedPublication {
  kind: "extracted";
  title: string;
  year: number;
  quartile: Quartile;
}

export interface SkippedPublication {
  kind: "skipped";
  year: number;
  reason: SkipReason;
}

export type PublicationOutcome = ExtractedPublication | SkippedPublication;
