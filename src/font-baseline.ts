import type { ExtractedPage, SizeThresholds } from "./outline-types.ts";
import {
  BASELINE_SAMPLE_PAGE_LIMIT,
  DEFAULT_BASELINE_FONT_SIZE,
  H1_SIZE_RATIO,
  H2_SIZE_RATIO,
  H3_SIZE_RATIO,
} from "./outline-types.ts";
import { pageRawLines } from "./text-lines.ts";

/**
 * Body-text font size of the document: the most frequent span size over the
 * first pages. Ties go to the size seen first.
 */
export function computeBaselineFontSize(pages: ExtractedPage[]): number {
  const frequencies = new Map<number, number>();
  for (const page of pages.slice(0, BASELINE_SAMPLE_PAGE_LIMIT)) {
    for (const line of pageRawLines(page)) {
      for (const span of line.spans) {
        if (span.text.trim().length === 0) continue;
        frequencies.set(span.size, (frequencies.get(span.size) ?? 0) + 1);
      }
    }
  }

  let baseline = DEFAULT_BASELINE_FONT_SIZE;
  let bestCount = 0;
  for (const [size, count] of frequencies) {
    if (count > bestCount) {
      baseline = size;
      bestCount = count;
    }
  }
  return baseline > 0 ? baseline : DEFAULT_BASELINE_FONT_SIZE;
}

export function computeSizeThresholds(baseline: number): SizeThresholds {
  return {
    h1: baseline * H1_SIZE_RATIO,
    h2: baseline * H2_SIZE_RATIO,
    h3: baseline * H3_SIZE_RATIO,
  };
}
