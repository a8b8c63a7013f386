import { ParserConfig, resolveParserConfig } from "../config/parserConfig";
import { ClassifiedLine, Quartile, QUARTILES, RawLine } from "../types/publication";

export type LineClassifier = (line: RawLine) => ClassifiedLine;

const FOUR_DIGIT_NUMBER = /(?<!\d)\d{4}(?!\d)/g;
const NO_LETTERS = /^[\d\s\p{P}\p{S}]+$/u;

function isQuartile(text: string): text is Quartile {
  return QUARTILES.some((quartile) => quartile === text);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function buildPrefixPattern(prefixes: string[]): RegExp {
  const alternatives = prefixes.map(escapeRegExp).join("|");
  return new RegExp(`^(?:${alternatives})(?![A-Za-z])`);
}

/** Rightmost standalone 4-digit number inside the configured year range, if any. */
export function findLastYear(text: string, yearMin: number, yearMax: number): number | null {
  let year: number | null = null;
  for (const match of text.matchAll(FOUR_DIGIT_NUMBER)) {
    const value = Number(match[0]);
    if (value >= yearMin && value <= yearMax) year = value;
  }
  return year;
}

/** Throws when `config` falls outside the bounds `ParserConfigSchema` enforces. */
export function createLineClassifier(candidate: ParserConfig): LineClassifier {
  const config = resolveParserConfig(candidate);
  const prefixPattern = buildPrefixPattern(config.metadataPrefixes);
  const placeholders = new Set(config.placeholderTokens);

  function isMetadata(text: string): boolean {
    return (
      placeholders.has(text) ||
      prefixPattern.test(text) ||
      NO_LETTERS.test(text) ||
      text.length < config.minContentLength
    );
  }

  return (line) => {
    const text = line.text.trim();
    if (isQuartile(text)) {
      return { kind: "QUARTILE", line, quartile: text };
    }

    const year = findLastYear(text, config.yearMin, config.yearMax);
    if (year !== null) {
      return { kind: "YEAR_ANCHOR", line, year };
    }

    if (isMetadata(text)) {
      return { kind: "METADATA", line };
    }

    return { kind: "CONTENT", line };
  };
}
