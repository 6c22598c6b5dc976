import { resolve } from "node:path";
import type {
  DocumentAnalysisContext,
  DocumentOutline,
  ExtractedDocument,
} from "./outline-types.ts";
import { ERROR_TITLE } from "./outline-types.ts";
import { filterHeadingsWithContent } from "./content-filter.ts";
import { assertReadableFile } from "./file-access.ts";
import { computeBaselineFontSize, computeSizeThresholds } from "./font-baseline.ts";
import { detectHeadings } from "./heading-detect.ts";
import { dedupeAndSortHeadings } from "./heading-order.ts";
import { extractDocument } from "./pdf-extract.ts";
import { detectTitle } from "./title-detect.ts";

export class OutlineExtractionError extends Error {
  readonly inputPdfPath: string;

  constructor(inputPdfPath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to extract outline from ${inputPdfPath}: ${reason}`, { cause });
    this.name = "OutlineExtractionError";
    this.inputPdfPath = inputPdfPath;
  }
}

export interface OutlineStats {
  pageCount: number;
  bodyFontSize: number;
}

export type OutlineResult =
  | { ok: true; outline: DocumentOutline; stats: OutlineStats }
  | { ok: false; error: OutlineExtractionError };

export interface ExtractPdfOutlineDependencies {
  assertReadableFile: (filePath: string) => Promise<void>;
  extractDocument: (inputPdfPath: string) => Promise<ExtractedDocument>;
}

const defaultDependencies: ExtractPdfOutlineDependencies = {
  assertReadableFile,
  extractDocument,
};

export function buildAnalysisContext(document: ExtractedDocument): DocumentAnalysisContext {
  const baseline = computeBaselineFontSize(document.pages);
  return Object.freeze({
    baseline,
    thresholds: Object.freeze(computeSizeThresholds(baseline)),
    title: detectTitle(document, baseline),
    pageCount: document.pages.length,
  });
}

export function extractOutline(
  document: ExtractedDocument,
  context: DocumentAnalysisContext = buildAnalysisContext(document),
): DocumentOutline {
  const headings = dedupeAndSortHeadings(detectHeadings(document.pages, context));
  return {
    title: context.title,
    outline: filterHeadingsWithContent(headings, document, context),
  };
}

export async function extractPdfOutline(
  inputPdfPath: string,
  dependencies: ExtractPdfOutlineDependencies = defaultDependencies,
): Promise<OutlineResult> {
  const resolvedInputPdfPath = resolve(inputPdfPath);
  try {
    await dependencies.assertReadableFile(resolvedInputPdfPath);
    const document = await dependencies.extractDocument(resolvedInputPdfPath);
    const context = buildAnalysisContext(document);
    return {
      ok: true,
      outline: extractOutline(document, context),
      stats: { pageCount: context.pageCount, bodyFontSize: context.baseline },
    };
  } catch (error) {
    return { ok: false, error: new OutlineExtractionError(resolvedInputPdfPath, error) };
  }
}

export function toOutlineOutput(result: OutlineResult): DocumentOutline {
  return result.ok ? result.outline : { title: ERROR_TITLE, outline: [] };
}
