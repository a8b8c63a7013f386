import path from "path";
import { closePool } from "../db";
import { insertPublications, PublicationType, toPublicationRows } from "../db/insertPublications";
import { readParseReport } from "../io/parseReport";

interface PersistOptions {
  reportPath: string;
  facultyId: number;
  type?: PublicationType;
}

async function persistReport(options: PersistOptions): Promise<void> {
  const reportPath = path.resolve(options.reportPath);
  const report = await readParseReport(reportPath);
  const rows = toPublicationRows(report, {
    facultyId: options.facultyId,
    type: options.type,
    sourceReport: report.source
  });

  const inserted = await insertPublications(rows);
  console.log(
    `Persisted ${inserted} of ${rows.length} extracted publications for faculty ${options.facultyId} (${rows.length - inserted} already stored).`
  );
}

export async function runPersistCommand(opts: PersistOptions): Promise<void> {
  try {
    await persistReport(opts);
  } finally {
    await closePool().catch((error: unknown) => {
      console.error(`Failed to close database pool: ${error instanceof Error ? error.message : String(error)}`);
    });
  }
}
