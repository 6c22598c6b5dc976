import type { DetectedHeading } from "./outline-types.ts";

export function dedupeAndSortHeadings(headings: DetectedHeading[]): DetectedHeading[] {
  const seen = new Set<string>();
  const unique: DetectedHeading[] = [];
  for (const heading of headings) {
    const key = JSON.stringify([heading.text, heading.page]);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(heading);
  }
  return unique.sort((left, right) => left.page - right.page || headingTop(left) - headingTop(right));
}

function headingTop(heading: DetectedHeading): number {
  return heading.bbox ? heading.bbox[1] : 0;
}
