import { describe, expect, it } from "vitest";
import type { DetectedHeading } from "./outline-types.ts";
import { dedupeAndSortHeadings } from "./heading-order.ts";

describe("dedupeAndSortHeadings", () => {
  it("keeps the first heading for each text and page pair", () => {
    const result = dedupeAndSortHeadings([
      heading("Introduction", 0, 100, "H1"),
      heading("Introduction", 0, 300, "H2"),
      heading("Introduction", 1, 50, "H1"),
    ]);
    expect(result.map((h) => [h.text, h.page, h.level])).toEqual([
      ["Introduction", 0, "H1"],
      ["Introduction", 1, "H1"],
    ]);
  });

  it("orders by page, then by vertical position", () => {
    const result = dedupeAndSortHeadings([
      heading("Later page", 2, 10),
      heading("Bottom", 0, 500),
      heading("Top", 0, 20),
      heading("Middle", 1, 250),
    ]);
    expect(result.map((h) => h.text)).toEqual(["Top", "Bottom", "Middle", "Later page"]);
  });

  it("sorts headings without a bbox to the top of their page", () => {
    const result = dedupeAndSortHeadings([heading("Placed", 0, 40), { ...heading("Unplaced", 0, 0), bbox: undefined }]);
    expect(result.map((h) => h.text)).toEqual(["Unplaced", "Placed"]);
  });
});

function heading(text: string, page: number, top: number, level: DetectedHeading["level"] = "H1"): DetectedHeading {
  return { level, text, page, confidence: 0.7, bbox: [0, top, 100, top + 12] };
}
