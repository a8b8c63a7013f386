import { ParserConfig } from "../config/parserConfig";
import { OutcomeSummary } from "../extract/summary";
import { SourceFormat } from "../text/sourceText";
import { PublicationOutcome } from "./publication";

export interface ParseReport {
  schema_version: "1.0";
  source: string;
  format: SourceFormat;
  generated_at: string;
  config: ParserConfig;
  summary: OutcomeSummary;
  outcomes: PublicationOutcome[];
}
