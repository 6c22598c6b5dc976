export type BoundingBox = readonly [x0: number, y0: number, x1: number, y1: number];

export interface Span {
  text: string;
  size: number;
  flags: number;
  /** Top-down page coordinates: y grows toward the bottom of the page. */
  bbox: BoundingBox;
}

export interface RawLine {
  spans: Span[];
}

export type PageBlock =
  | { kind: "text"; lines: RawLine[] }
  | { kind: "image-or-table"; bbox?: BoundingBox };

export interface ExtractedPage {
  pageIndex: number;
  width: number;
  height: number;
  blocks: PageBlock[];
}

export interface OutlineMetadataEntry {
  level: number;
  label: string;
  /** 1-based, when the bookmark destination could be resolved. */
  page?: number;
}

export interface ExtractedDocument {
  pages: ExtractedPage[];
  outline: OutlineMetadataEntry[];
}

export interface Line {
  text: string;
  size: number;
  flags: number;
  bbox: BoundingBox;
  confidence: number;
}

/** A visual line before it has been scored. */
export type MergedLine = Omit<Line, "confidence">;

export type HeadingLevel = "H1" | "H2" | "H3";

export interface DetectedHeading {
  level: HeadingLevel;
  text: string;
  /** 0-based until the content filter emits it. */
  page: number;
  confidence: number;
  bbox?: BoundingBox;
}

export interface OutlineHeading {
  level: HeadingLevel;
  text: string;
  page: number;
}

export interface DocumentOutline {
  title: string;
  outline: OutlineHeading[];
}

export interface SizeThresholds {
  h1: number;
  h2: number;
  h3: number;
}

export interface DocumentAnalysisContext {
  readonly baseline: number;
  readonly thresholds: Readonly<SizeThresholds>;
  readonly title: string;
  readonly pageCount: number;
}

export const FONT_FLAG_ITALIC = 1 << 1;
export const FONT_FLAG_BOLD = 1 << 4;

export const BASELINE_SAMPLE_PAGE_LIMIT = 3;
export const DEFAULT_BASELINE_FONT_SIZE = 12;

export const UNKNOWN_TITLE = "Unknown Title";
export const ERROR_TITLE = "Error";
export const TITLE_MIN_LENGTH = 4;
export const TITLE_MAX_LENGTH = 150;
export const TITLE_MIN_SIZE_RATIO = 1.2;
export const TITLE_CANDIDATE_COUNT = 2;
export const TITLE_CANDIDATE_SEPARATOR = "  ";
export const MAX_REJECTED_BOOKMARK_TITLE_LENGTH = 3;
export const BOOKMARK_TITLE_REJECT_PREFIXES = ["table of contents", "contents", "toc"] as const;
export const TITLE_SKIP_WORDS = [
  "copyright",
  "version",
  "page",
  "©",
  "confidential",
  "draft",
  "revision",
  "date",
  "author",
] as const;

export const H1_SIZE_RATIO = 1.4;
export const H2_SIZE_RATIO = 1.2;
export const H3_SIZE_RATIO = 1.1;

export const LARGE_SIZE_RATIO = 1.3;
export const MEDIUM_SIZE_RATIO = 1.1;
export const LARGE_SIZE_WEIGHT = 0.3;
export const MEDIUM_SIZE_WEIGHT = 0.2;
export const BOLD_WEIGHT = 0.2;
export const PATTERN_WEIGHT = 0.3;
export const LENGTH_WEIGHT = 0.1;
export const MAX_CONFIDENCE = 1;
export const MIN_CANDIDATE_CONFIDENCE = 0.4;
export const SCORED_LENGTH_MIN = 5;
export const SCORED_LENGTH_MAX = 100;
export const MIN_LINE_LENGTH = 2;
export const MIN_HEADING_LENGTH = 3;
export const MAX_HEADING_LENGTH = 200;
export const NON_FIRST_PAGE_METADATA_LABELS: ReadonlySet<string> = new Set([
  "overview",
  "version",
  "date",
  "remarks",
  "identifier",
  "reference",
]);
export const CONTINUATION_HEADING_TEXT = "syllabus";

export const MIN_PROSE_LINE_LENGTH = 40;

export const MIN_COLUMN_BREAK_GAP = 120;
export const MIN_COLUMN_BREAK_GAP_RATIO = 0.18;
export const MIN_COLUMN_GUTTER_EMS = 1;
export const COLUMN_BREAK_LEFT_MAX_RATIO = 0.55;
export const COLUMN_BREAK_RIGHT_MIN_RATIO = 0.33;
export const MIN_COLUMN_BREAK_TEXT_CHARACTER_COUNT = 6;
