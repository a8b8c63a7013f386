import { Anchor, ClassifiedLine, Window } from "../types/publication";

export function scanYearAnchors(classified: readonly ClassifiedLine[]): Anchor[] {
  const anchors: Anchor[] = [];
  for (const entry of classified) {
    if (entry.kind === "YEAR_ANCHOR") {
      anchors.push({ lineIndex: entry.line.index, year: entry.year });
    }
  }
  return anchors;
}

/**
 * Each window runs from the previous anchor (or before the first line) up to its own anchor,
 * both exclusive, so no scan can read another record's lines.
 */
export function buildWindows(anchors: readonly Anchor[]): Window[] {
  return anchors.map((anchor, i) => ({
    anchor,
    lowerBoundExclusive: i > 0 ? anchors[i - 1].lineIndex : -1,
    upperBoundExclusive: anchor.lineIndex
  }));
}
