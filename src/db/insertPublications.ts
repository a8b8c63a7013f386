import { getDb } from "./client";
import * as schema from "./schema";
import { ParseReport } from "../types/parseReport";

export const PUBLICATION_TYPES = ["journal", "conf", "bookchapter", "other"] as const;

export type PublicationType = (typeof PUBLICATION_TYPES)[number];

export function isPublicationType(value: string): value is PublicationType {
  return PUBLICATION_TYPES.some((type) => type === value);
}

export interface PublicationRowOptions {
  facultyId: number;
  type?: PublicationType | null;
  sourceReport?: string | null;
}

function assertStorable(title: string, year: number): void {
  if (title.length > schema.TITLE_MAX_LENGTH) {
    throw new Error(
      `Title exceeds ${schema.TITLE_MAX_LENGTH} characters: ${title.slice(0, 40)}...`
    );
  }
  if (year < schema.PUB_YEAR_MIN || year > schema.PUB_YEAR_MAX) {
    throw new Error(
      `Publication year ${year} is outside ${schema.PUB_YEAR_MIN}-${schema.PUB_YEAR_MAX}: ${title}`
    );
  }
}

/**
 * Maps the extracted outcomes of a report to rows; skipped outcomes are not stored.
 * Throws before anything is written when a record does not fit the table.
 */
export function toPublicationRows(
  report: ParseReport,
  options: PublicationRowOptions
): schema.PublicationInsert[] {
  const rows: schema.PublicationInsert[] = [];
  for (const outcome of report.outcomes) {
    if (outcome.kind !== "extracted") continue;
    assertStorable(outcome.title, outcome.year);
    rows.push({
      facultyId: options.facultyId,
      title: outcome.title,
      pubYear: outcome.year,
      ranking: outcome.quartile.toLowerCase(),
      type: options.type ?? null,
      sourceReport: options.sourceReport ?? null
    });
  }
  return rows;
}

/** Returns how many rows were new; rows already stored for the same faculty, title and year are left alone. */
export async function insertPublications(rows: schema.PublicationInsert[]): Promise<number> {
  if (rows.length === 0) return 0;
  const db = getDb();

  return db.transaction(async (tx) => {
    const inserted = await tx
      .insert(schema.publications)
      .values(rows)
      .onConflictDoNothing({
        target: [
          schema.publications.facultyId,
          schema.publications.title,
          schema.publications.pubYear
        ]
      })
      .returning({ id: schema.publications.id });
    return inserted.length;
  });
}
