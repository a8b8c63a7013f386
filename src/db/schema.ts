import {
  pgTable,
  text,
  timestamp,
  integer,
  serial,
  index,
  uniqueIndex,
  varchar
} from "drizzle-orm/pg-core";

export const TITLE_MAX_LENGTH = 500;
export const PUB_YEAR_MIN = 1900;
export const PUB_YEAR_MAX = 2100;

export const publications = pgTable(
  "publications",
  {
    id: serial("id").primaryKey(),
    facultyId: integer("faculty_id").notNull(),
    title: varchar("title", { length: TITLE_MAX_LENGTH }).notNull(),
    pubYear: integer("pub_year").notNull(), // PUB_YEAR_MIN..PUB_YEAR_MAX
    ranking: text("ranking").notNull(), // q1 | q2 | q3 | q4
    type: text("type"), // journal | conf | bookchapter | other
    sourceReport: text("source_report"),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull()
  },
  (table) => ({
    publicationsUnique: uniqueIndex("publications_faculty_title_year_idx").on(
      table.facultyId,
      table.title,
      table.pubYear
    ),
    publicationsFacultyIdx: index("publications_faculty_idx").on(table.facultyId),
    publicationsYearIdx: index("publications_year_idx").on(table.pubYear)
  })
);

export type PublicationInsert = typeof publications.$inferInsert;
