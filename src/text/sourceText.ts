import { promises as fs } from "fs";
import path from "path";
import { extractHtmlLines } from "./htmlText";

export type SourceFormat = "text" | "html";

export const SOURCE_FORMATS: readonly SourceFormat[] = ["text", "html"];

export function isSourceFormat(value: string): value is SourceFormat {
  return value === "text" || value === "html";
}

export function inferSourceFormat(inputPath: string): SourceFormat {
  const ext = path.extname(inputPath).toLowerCase();
  return ext === ".html" || ext === ".htm" ? "html" : "text";
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

export function toPlainText(content: string, format: SourceFormat): string {
  return format === "html" ? extractHtmlLines(content) : content;
}

/** Reads the pasted block from a file, or from stdin when the path is "-". */
export async function readSourceText(inputPath: string, format: SourceFormat): Promise<string> {
  const content = inputPath === "-" ? await readStdin() : await fs.readFile(inputPath, "utf8");
  return toPlainText(content, format);
}
