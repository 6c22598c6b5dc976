import type { ExtractedPage, MergedLine, RawLine, Span } from "./outline-types.ts";
import {
  COLUMN_BREAK_LEFT_MAX_RATIO,
  COLUMN_BREAK_RIGHT_MIN_RATIO,
  MIN_COLUMN_BREAK_GAP,
  MIN_COLUMN_BREAK_GAP_RATIO,
  MIN_COLUMN_BREAK_TEXT_CHARACTER_COUNT,
  MIN_COLUMN_GUTTER_EMS,
  MIN_LINE_LENGTH,
} from "./outline-types.ts";

const LINE_Y_BUCKET_SIZE = 2;

export function rawLineText(line: RawLine): string {
  return line.spans
    .map((span) => span.text.trim())
    .filter((text) => text.length > 0)
    .join(" ");
}

export function mergeRawLine(line: RawLine): MergedLine | undefined {
  const spans = line.spans.filter((span) => span.text.trim().length > 0);
  if (spans.length === 0) return undefined;

  const text = rawLineText({ spans });
  if (text.length < MIN_LINE_LENGTH) return undefined;

  return {
    text,
    size: Math.max(...spans.map((span) => span.size)),
    flags: spans.reduce((flags, span) => flags | span.flags, 0),
    bbox: spans[0].bbox,
  };
}

export function pageRawLines(page: ExtractedPage): RawLine[] {
  const lines: RawLine[] = [];
  for (const block of page.blocks) {
    if (block.kind === "text") lines.push(...block.lines);
  }
  return lines;
}

export function collectPageLines(page: ExtractedPage): MergedLine[] {
  const lines: MergedLine[] = [];
  for (const rawLine of pageRawLines(page)) {
    const merged = mergeRawLine(rawLine);
    if (merged) lines.push(merged);
  }
  return lines;
}

export function hasImageOrTableBlock(page: ExtractedPage): boolean {
  return page.blocks.some((block) => block.kind === "image-or-table");
}

/**
 * Groups loose spans into visual lines, top of the page first and left to
 * right within a line. A row that crosses a column gutter becomes one line
 * per column.
 */
export function groupSpansIntoLines(spans: Span[], pageWidth: number): RawLine[] {
  const buckets = new Map<number, Span[]>();
  for (const span of spans) {
    const bucket = Math.round(span.bbox[3] / LINE_Y_BUCKET_SIZE) * LINE_Y_BUCKET_SIZE;
    const existing = buckets.get(bucket);
    if (existing) {
      existing.push(span);
    } else {
      buckets.set(bucket, [span]);
    }
  }

  return [...buckets.entries()]
    .sort((left, right) => left[0] - right[0])
    .flatMap(([, bucketSpans]) => {
      const row = [...bucketSpans].sort((left, right) => left.bbox[0] - right.bbox[0]);
      return splitSpansByColumnBreaks(row, pageWidth).map((columnSpans) => ({ spans: columnSpans }));
    });
}

function splitSpansByColumnBreaks(row: Span[], pageWidth: number): Span[][] {
  const groups: Span[][] = [];
  let current: Span[] = [];
  row.forEach((span, index) => {
    if (current.length > 0 && isLikelyColumnBreak(current, row.slice(index), pageWidth)) {
      groups.push(current);
      current = [];
    }
    current.push(span);
  });
  if (current.length > 0) groups.push(current);
  return groups;
}

function isLikelyColumnBreak(left: Span[], right: Span[], pageWidth: number): boolean {
  const leftX = left[0].bbox[0];
  const rightX = right[0].bbox[0];
  const leftEnd = Math.max(...left.map((span) => span.bbox[2]));
  const minimumGap = Math.max(MIN_COLUMN_BREAK_GAP, pageWidth * MIN_COLUMN_BREAK_GAP_RATIO);
  if (rightX - leftX < minimumGap) return false;
  // Justified prose split into several items has no gutter between them.
  if (rightX - leftEnd < right[0].size * MIN_COLUMN_GUTTER_EMS) return false;
  if (leftX > pageWidth * COLUMN_BREAK_LEFT_MAX_RATIO) return false;
  if (rightX < pageWidth * COLUMN_BREAK_RIGHT_MIN_RATIO) return false;
  return (
    countSubstantiveChars(rawLineText({ spans: left })) >= MIN_COLUMN_BREAK_TEXT_CHARACTER_COUNT &&
    countSubstantiveChars(rawLineText({ spans: right })) >= MIN_COLUMN_BREAK_TEXT_CHARACTER_COUNT
  );
}

function countSubstantiveChars(text: string): number {
  return text.replace(/[^\p{L}\p{N}]+/gu, "").length;
}
