export { parsePublications } from "./extract/parsePublications";
export { normalizeLines } from "./extract/lines";
export { createLineClassifier, findLastYear } from "./extract/classify";
export type { LineClassifier } from "./extract/classify";
export { scanYearAnchors, buildWindows } from "./extract/anchors";
export { scanQuartile, scanTitle } from "./extract/scan";
export type { QuartileMatch, TitleMatch } from "./extract/scan";
export { assembleOutcome } from "./extract/assemble";
export { summarizeOutcomes } from "./extract/summary";
export type { OutcomeSummary } from "./extract/summary";
export {
  ParserConfigSchema,
  DEFAULT_PARSER_CONFIG,
  DEFAULT_METADATA_PREFIXES,
  loadParserConfig
} from "./config/parserConfig";
export type { ParserConfig } from "./config/parserConfig";
export { extractHtmlLines } from "./text/htmlText";
export { readSourceText, toPlainText, inferSourceFormat } from "./text/sourceText";
export type { SourceFormat } from "./text/sourceText";
export { buildParseReport, readParseReport, writeParseReport } from "./io/parseReport";
export type { ParseReport } from "./types/parseReport";
export * from "./types/publication";
