import { RawLine } from "../types/publication";

export function normalizeLines(rawText: string): RawLine[] {
  const lines: RawLine[] = [];
  for (const part of rawText.split(/\r\n|\r|\n/)) {
    const text = part.trim();
    if (!text) continue;
    lines.push({ text, index: lines.length });
  }
  return lines;
}
