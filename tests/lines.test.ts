import { describe, expect, it } from "vitest";
import { normalizeLines } from "../src/extract/lines";

describe("Line normalization", () => {
  it("trims lines, drops blanks and re-indexes the survivors", () => {
    const lines = normalizeLines("  first line  \n\n\t\nsecond line\r\n   \r\nthird\rfourth");

    expect(lines).toEqual([
      { text: "first line", index: 0 },
      { text: "second line", index: 1 },
      { text: "third", index: 2 },
      { text: "fourth", index: 3 }
    ]);
  });

  it("keeps tabs inside a line", () => {
    expect(normalizeLines("48\t2023\n")).toEqual([{ text: "48\t2023", index: 0 }]);
  });

  it("returns an empty sequence for empty or blank input", () => {
    expect(normalizeLines("")).toEqual([]);
    expect(normalizeLines(" \n \r\n\t")).toEqual([]);
  });
});
