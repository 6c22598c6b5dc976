import type { HeadingLevel } from "./outline-types.ts";

export interface HeadingPattern {
  name: string;
  pattern: RegExp;
}

// Matched against trimmed text, case-insensitively, so "all-caps" and
// "title-case" also accept lower-case words.
export const HEADING_PATTERNS: readonly HeadingPattern[] = [
  { name: "numbered", pattern: /^\d+\.?\s+[A-Z]/i },
  { name: "sub-numbered", pattern: /^\d+\.\d+\.?\s+/i },
  { name: "keyword-prefixed", pattern: /^(Chapter|Section|Part)\s+\d+/i },
  { name: "all-caps", pattern: /^[A-Z][A-Z\s]{2,}$/i },
  { name: "title-case", pattern: /^[A-Z][a-z]+(\s+[A-Z][a-z]*)*$/i },
  {
    name: "named-section",
    pattern: /^(Abstract|Introduction|Conclusion|References|Bibliography|Acknowledgments?)$/i,
  },
];

export interface NumberingLevelHint {
  level: HeadingLevel;
  pattern: RegExp;
}

/** Deepest numbering first: "2.3.1 Foo" must not be read as a top-level "2.". */
export const NUMBERING_LEVEL_HINTS: readonly NumberingLevelHint[] = [
  { level: "H3", pattern: /^\d+\.\d+\.\d+\.?\s+/ },
  { level: "H2", pattern: /^\d+\.\d+\.?\s+/ },
  { level: "H1", pattern: /^\d+\.?\s+/ },
];

export function findHeadingPattern(text: string): HeadingPattern | undefined {
  const trimmed = text.trim();
  return HEADING_PATTERNS.find(({ pattern }) => pattern.test(trimmed));
}

export function matchesHeadingPattern(text: string): boolean {
  return findHeadingPattern(text) !== undefined;
}

export function detectNumberingLevel(text: string): HeadingLevel | undefined {
  const trimmed = text.trim();
  return NUMBERING_LEVEL_HINTS.find(({ pattern }) => pattern.test(trimmed))?.level;
}

export function headingDepth(level: HeadingLevel): number {
  return Number.parseInt(level.slice(1), 10);
}
