import { ClassifiedLine, LineKind, Quartile, Window } from "../types/publication";

type ScanStep = "match" | "skip" | "stop";

export interface QuartileMatch {
  quartile: Quartile;
  lineIndex: number;
}

export interface TitleMatch {
  title: string;
  lineIndex: number;
}

/**
 * Walks from `startIndex` toward the window's lower bound and returns the first line the
 * policy accepts. Lines the policy marks "stop" end the walk without a match.
 */
function findUpward(
  classified: readonly ClassifiedLine[],
  window: Window,
  startIndex: number,
  policy: (kind: LineKind) => ScanStep
): ClassifiedLine | null {
  const from = Math.min(startIndex, window.upperBoundExclusive - 1);
  for (let i = from; i > window.lowerBoundExclusive; i--) {
    const entry = classified[i];
    const step = policy(entry.kind);
    if (step === "match") return entry;
    if (step === "stop") return null;
  }
  return null;
}

function quartilePolicy(kind: LineKind): ScanStep {
  if (kind === "QUARTILE") return "match";
  if (kind === "YEAR_ANCHOR") return "stop";
  return "skip";
}

function titlePolicy(kind: LineKind): ScanStep {
  if (kind === "CONTENT") return "match";
  if (kind === "YEAR_ANCHOR") return "stop";
  return "skip";
}

export function scanQuartile(
  classified: readonly ClassifiedLine[],
  window: Window
): QuartileMatch | null {
  const entry = findUpward(classified, window, window.upperBoundExclusive - 1, quartilePolicy);
  if (entry?.kind !== "QUARTILE") return null;
  return { quartile: entry.quartile, lineIndex: entry.line.index };
}

export function scanTitle(
  classified: readonly ClassifiedLine[],
  window: Window,
  quartile: QuartileMatch | null
): TitleMatch | null {
  const startIndex = quartile ? quartile.lineIndex - 1 : window.upperBoundExclusive - 1;
  const entry = findUpward(classified, window, startIndex, titlePolicy);
  if (entry?.kind !== "CONTENT") return null;
  return { title: entry.line.text, lineIndex: entry.line.index };
}
