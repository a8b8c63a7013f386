import { Anchor, PublicationOutcome } from "../types/publication";
import { QuartileMatch, TitleMatch } from "./scan";

export function assembleOutcome(
  anchor: Anchor,
  quartile: QuartileMatch | null,
  title: TitleMatch | null
): PublicationOutcome {
  if (!title) {
    return { kind: "skipped", year: anchor.year, reason: "MISSING_TITLE" };
  }
  if (!quartile) {
    return { kind: "skipped", year: anchor.year, reason: "MISSING_QUARTILE" };
  }
  return {
    kind: "extracted",
    title: title.title,
    year: anchor.year,
    quartile: quartile.quartile
  };
}
