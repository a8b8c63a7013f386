import { DEFAULT_PARSER_CONFIG, ParserConfig } from "../config/parserConfig";
import { PublicationOutcome } from "../types/publication";
import { buildWindows, scanYearAnchors } from "./anchors";
import { assembleOutcome } from "./assemble";
import { createLineClassifier } from "./classify";
import { normalizeLines } from "./lines";
import { scanQuartile, scanTitle } from "./scan";

/**
 * Extracts one outcome per year anchor from a pasted publication list, in the order the
 * anchors appear. Incomplete records come back as `skipped` outcomes; the only error is an
 * invalid `config`.
 */
export function parsePublications(
  rawText: string,
  config: ParserConfig = DEFAULT_PARSER_CONFIG
): PublicationOutcome[] {
  const classify = createLineClassifier(config);
  const classified = normalizeLines(rawText).map(classify);
  const windows = buildWindows(scanYearAnchors(classified));

  return windows.map((window) => {
    const quartile = scanQuartile(classified, window);
    const title = scanTitle(classified, window, quartile);
    return assembleOutcome(window.anchor, quartile, title);
  });
}
