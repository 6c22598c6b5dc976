const CONTROL_CHARACTER_PATTERN = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g;
const UNPAIRED_SURROGATE_PATTERN = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

export function normalizeSpacing(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Final cleanup for any text that leaves the pipeline (title and heading text). */
export function normalizeText(text: string): string {
  return normalizeSpacing(text)
    .replace(CONTROL_CHARACTER_PATTERN, "")
    .replace(UNPAIRED_SURROGATE_PATTERN, "");
}

export function isFullyUppercase(text: string): boolean {
  return text === text.toUpperCase() && text !== text.toLowerCase();
}
