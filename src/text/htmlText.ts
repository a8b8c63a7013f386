import * as cheerio from "cheerio";
import { normalizeWhitespace } from "../utils/text";

const LINE_BLOCKS = "p, div, li, tr, td, th, h1, h2, h3, h4, h5, h6, dt, dd, caption";

// Private-use character marking block ends; source newlines are plain whitespace in HTML.
const LINE_BREAK = "\uE000";

/**
 * Visible text of a pasted or saved HTML page, one block or table cell per line, so that the
 * line-oriented extractor sees the same layout as a plain-text paste.
 */
export function extractHtmlLines(html: string): string {
  const $ = cheerio.load(html);

  $("script, style, noscript, svg, head, meta, link").remove();
  $("[aria-hidden='true'], [hidden]").remove();
  $("[style*='display:none'], [style*='display: none']").remove();
  $("[style*='visibility:hidden'], [style*='visibility: hidden']").remove();

  $("br").replaceWith(LINE_BREAK);
  $(LINE_BLOCKS).append(LINE_BREAK);

  const text = $("body").text() || $.root().text();
  return text
    .split(LINE_BREAK)
    .map(normalizeWhitespace)
    .filter((line) => line.length > 0)
    .join("\n");
}
