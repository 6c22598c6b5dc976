import type {
  DetectedHeading,
  DocumentAnalysisContext,
  ExtractedDocument,
  OutlineHeading,
} from "./outline-types.ts";
import { MIN_PROSE_LINE_LENGTH } from "./outline-types.ts";
import { headingDepth, matchesHeadingPattern } from "./heading-patterns.ts";
import { isFullyUppercase } from "./string-utils.ts";
import { hasImageOrTableBlock, pageRawLines, rawLineText } from "./text-lines.ts";

const BULLET_ITEM_PATTERN = /^\s*[•\-*]\s+\S+/;
const NUMBERED_ITEM_PATTERN = /^\s*\(?\d+[.)]\s+\S+/;

/**
 * Keeps headings that introduce something: a deeper heading within the next
 * page, or prose, a list item or an image/table before the next heading.
 * Retained headings are emitted with 1-based page numbers.
 */
export function filterHeadingsWithContent(
  headings: DetectedHeading[],
  document: ExtractedDocument,
  { pageCount }: DocumentAnalysisContext,
): OutlineHeading[] {
  const result: OutlineHeading[] = [];
  headings.forEach((heading, index) => {
    const nextHeading = index + 1 < headings.length ? headings[index + 1] : undefined;
    if (
      !hasChildHeadings(headings, index) &&
      !hasContentAfterHeading(heading, nextHeading, document, pageCount)
    ) {
      return;
    }
    result.push({ level: heading.level, text: heading.text, page: heading.page + 1 });
  });
  return result;
}

export function hasChildHeadings(headings: DetectedHeading[], index: number): boolean {
  const heading = headings[index];
  const depth = headingDepth(heading.level);
  for (const later of headings.slice(index + 1)) {
    if (later.page > heading.page + 1) return false;
    if (headingDepth(later.level) > depth) return true;
  }
  return false;
}

export function hasContentAfterHeading(
  heading: DetectedHeading,
  nextHeading: DetectedHeading | undefined,
  document: ExtractedDocument,
  pageCount: number,
): boolean {
  const lastPage = pageCount - 1;
  const endPage = nextHeading ? nextHeading.page : Math.min(heading.page + 1, lastPage);
  const headingText = heading.text.toLowerCase();

  for (let pageIndex = heading.page; pageIndex <= endPage; pageIndex += 1) {
    const page = document.pages[pageIndex];
    if (!page) continue;

    for (const rawLine of pageRawLines(page)) {
      const text = rawLineText(rawLine);
      if (!text) continue;
      const lower = text.toLowerCase();
      if (lower.includes(headingText) || headingText.includes(lower)) continue;
      if (matchesHeadingPattern(text)) continue;
      if (isContentLine(text)) return true;
    }
    if (hasImageOrTableBlock(page)) return true;
  }

  return false;
}

export function isContentLine(text: string): boolean {
  if (text.length > MIN_PROSE_LINE_LENGTH && !isFullyUppercase(text)) return true;
  return BULLET_ITEM_PATTERN.test(text) || NUMBERED_ITEM_PATTERN.test(text);
}
