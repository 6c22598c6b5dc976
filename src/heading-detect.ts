import type {
  DetectedHeading,
  DocumentAnalysisContext,
  ExtractedPage,
  HeadingLevel,
  Line,
  MergedLine,
  SizeThresholds,
} from "./outline-types.ts";
import {
  BOLD_WEIGHT,
  CONTINUATION_HEADING_TEXT,
  FONT_FLAG_BOLD,
  LARGE_SIZE_RATIO,
  LARGE_SIZE_WEIGHT,
  LENGTH_WEIGHT,
  MAX_CONFIDENCE,
  MAX_HEADING_LENGTH,
  MEDIUM_SIZE_RATIO,
  MEDIUM_SIZE_WEIGHT,
  MIN_CANDIDATE_CONFIDENCE,
  MIN_HEADING_LENGTH,
  NON_FIRST_PAGE_METADATA_LABELS,
  PATTERN_WEIGHT,
  SCORED_LENGTH_MAX,
  SCORED_LENGTH_MIN,
} from "./outline-types.ts";
import { detectNumberingLevel, matchesHeadingPattern } from "./heading-patterns.ts";
import { normalizeText } from "./string-utils.ts";
import { collectPageLines } from "./text-lines.ts";

type ScoredSignal = (line: MergedLine, baseline: number) => number;

export const sizeSignal: ScoredSignal = (line, baseline) => {
  if (line.size > baseline * LARGE_SIZE_RATIO) return LARGE_SIZE_WEIGHT;
  if (line.size > baseline * MEDIUM_SIZE_RATIO) return MEDIUM_SIZE_WEIGHT;
  return 0;
};

export const boldSignal: ScoredSignal = (line) =>
  (line.flags & FONT_FLAG_BOLD) !== 0 ? BOLD_WEIGHT : 0;

export const patternSignal: ScoredSignal = (line) =>
  matchesHeadingPattern(line.text) ? PATTERN_WEIGHT : 0;

export const lengthSignal: ScoredSignal = (line) => {
  const length = line.text.trim().length;
  return length >= SCORED_LENGTH_MIN && length <= SCORED_LENGTH_MAX ? LENGTH_WEIGHT : 0;
};

const CONFIDENCE_SIGNALS: readonly ScoredSignal[] = [
  sizeSignal,
  boldSignal,
  patternSignal,
  lengthSignal,
];

export function scoreHeadingConfidence(line: MergedLine, baseline: number): number {
  let confidence = 0;
  for (const signal of CONFIDENCE_SIGNALS) confidence += signal(line, baseline);
  return Math.min(confidence, MAX_CONFIDENCE);
}

export function scoreLine(line: MergedLine, baseline: number): Line {
  return { ...line, confidence: scoreHeadingConfidence(line, baseline) };
}

export function isHeadingCandidate(line: Line, thresholds: SizeThresholds): boolean {
  const { text } = line;
  if (text.length > MAX_HEADING_LENGTH || text.length < MIN_HEADING_LENGTH) return false;
  const meetsSize = line.size >= thresholds.h3;
  const meetsPattern = matchesHeadingPattern(text);
  return (meetsSize || meetsPattern) && line.confidence > MIN_CANDIDATE_CONFIDENCE;
}

export function assignHeadingLevel(line: MergedLine, thresholds: SizeThresholds): HeadingLevel {
  const numberedLevel = detectNumberingLevel(line.text);
  if (numberedLevel) return numberedLevel;
  if (line.size >= thresholds.h1) return "H1";
  if (line.size >= thresholds.h2) return "H2";
  return "H3";
}

export function detectPageHeadings(
  page: ExtractedPage,
  pageIndex: number,
  context: DocumentAnalysisContext,
): DetectedHeading[] {
  const headings: DetectedHeading[] = [];
  const normalizedTitle = context.title.toLowerCase();
  let previous: DetectedHeading | undefined;

  for (const merged of collectPageLines(page)) {
    const normalized = normalizeText(merged.text).toLowerCase();
    if (pageIndex !== 0 && NON_FIRST_PAGE_METADATA_LABELS.has(normalized)) continue;
    if (normalized === normalizedTitle) continue;

    const line = scoreLine(merged, context.baseline);
    if (!isHeadingCandidate(line, context.thresholds)) continue;

    // "Syllabus" set on its own line continues the heading above it.
    if (previous && normalized === CONTINUATION_HEADING_TEXT) {
      previous.text = normalizeText(`${previous.text} ${line.text}`);
      continue;
    }

    const heading: DetectedHeading = {
      level: assignHeadingLevel(line, context.thresholds),
      text: normalizeText(line.text),
      page: pageIndex,
      confidence: line.confidence,
      bbox: line.bbox,
    };
    headings.push(heading);
    previous = heading;
  }

  return headings;
}

export function detectHeadings(
  pages: ExtractedPage[],
  context: DocumentAnalysisContext,
): DetectedHeading[] {
  return pages.flatMap((page, pageIndex) => detectPageHeadings(page, pageIndex, context));
}
