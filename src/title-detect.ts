import type { ExtractedDocument, MergedLine, OutlineMetadataEntry } from "./outline-types.ts";
import {
  BOOKMARK_TITLE_REJECT_PREFIXES,
  FONT_FLAG_BOLD,
  MAX_REJECTED_BOOKMARK_TITLE_LENGTH,
  TITLE_CANDIDATE_COUNT,
  TITLE_CANDIDATE_SEPARATOR,
  TITLE_MAX_LENGTH,
  TITLE_MIN_LENGTH,
  TITLE_MIN_SIZE_RATIO,
  TITLE_SKIP_WORDS,
  UNKNOWN_TITLE,
} from "./outline-types.ts";
import { detectNumberingLevel } from "./heading-patterns.ts";
import { normalizeText } from "./string-utils.ts";
import { mergeRawLine, pageRawLines } from "./text-lines.ts";

interface TitleCandidate {
  text: string;
  size: number;
  top: number;
}

export function detectTitle(document: ExtractedDocument, baseline: number): string {
  const bookmarkTitle = findBookmarkTitle(document.outline);
  if (bookmarkTitle !== undefined) return bookmarkTitle;
  return findTitleFromFirstPage(document, baseline);
}

export function findBookmarkTitle(outline: OutlineMetadataEntry[]): string | undefined {
  const label = outline[0]?.label.trim();
  if (!label || label.length <= MAX_REJECTED_BOOKMARK_TITLE_LENGTH) return undefined;
  const lower = label.toLowerCase();
  if (BOOKMARK_TITLE_REJECT_PREFIXES.some((prefix) => lower.startsWith(prefix))) return undefined;
  return normalizeTitle(label);
}

function findTitleFromFirstPage(document: ExtractedDocument, baseline: number): string {
  const firstPage = document.pages[0];
  if (!firstPage) return UNKNOWN_TITLE;

  const candidates: TitleCandidate[] = [];
  for (const rawLine of pageRawLines(firstPage)) {
    const line = mergeRawLine(rawLine);
    if (!line || !isPotentialTitle(line, baseline)) continue;
    const tops = rawLine.spans.filter((span) => span.text.trim()).map((span) => span.bbox[1]);
    candidates.push({ text: line.text, size: line.size, top: Math.min(...tops) });
  }
  if (candidates.length === 0) return UNKNOWN_TITLE;

  candidates.sort((left, right) => right.size - left.size || left.top - right.top);
  const composed = candidates
    .slice(0, TITLE_CANDIDATE_COUNT)
    .map((candidate) => candidate.text)
    .join(TITLE_CANDIDATE_SEPARATOR);
  return normalizeTitle(composed) ?? UNKNOWN_TITLE;
}

function normalizeTitle(text: string): string | undefined {
  const normalized = normalizeText(text);
  return normalized.length > MAX_REJECTED_BOOKMARK_TITLE_LENGTH ? normalized : undefined;
}

export function isPotentialTitle(line: MergedLine, baseline: number): boolean {
  const { text } = line;
  if (text.length < TITLE_MIN_LENGTH || text.length > TITLE_MAX_LENGTH) return false;
  if (containsTitleSkipWord(text)) return false;
  // Numbered lines are section headings, never the document title.
  if (detectNumberingLevel(text)) return false;
  const isLarge = line.size > baseline * TITLE_MIN_SIZE_RATIO;
  const isBold = (line.flags & FONT_FLAG_BOLD) !== 0;
  return isLarge || isBold;
}

export function containsTitleSkipWord(text: string): boolean {
  const lower = text.toLowerCase();
  return TITLE_SKIP_WORDS.some((word) => lower.includes(word));
}
