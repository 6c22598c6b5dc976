import { readFile } from "node:fs/promises";
import { getDocument, OPS } from "pdfjs-dist/legacy/build/pdf.mjs";
import type {
  BoundingBox,
  ExtractedDocument,
  ExtractedPage,
  OutlineMetadataEntry,
  PageBlock,
  Span,
} from "./outline-types.ts";
import { FONT_FLAG_BOLD, FONT_FLAG_ITALIC } from "./outline-types.ts";
import { groupSpansIntoLines } from "./text-lines.ts";

type PdfDocument = Awaited<ReturnType<typeof getDocument>["promise"]>;
type PdfPage = Awaited<ReturnType<PdfDocument["getPage"]>>;
type PdfOutlineNode = Awaited<ReturnType<PdfDocument["getOutline"]>>[number];

export interface PdfTextItem {
  str: string;
  transform: number[];
  width: number;
  fontName: string;
}

interface PdfFontInfo {
  name: string;
}

interface PdfRef {
  num: number;
  gen: number;
}

const BOLD_FONT_NAME_PATTERN = /bold|black|heavy|semibold|demi/i;
const ITALIC_FONT_NAME_PATTERN = /italic|oblique/i;
const IMAGE_PAINT_OPERATORS: ReadonlySet<number> = new Set([
  OPS.paintImageXObject,
  OPS.paintImageXObjectRepeat,
  OPS.paintInlineImageXObject,
  OPS.paintInlineImageXObjectGroup,
  OPS.paintImageMaskXObject,
]);

export async function extractDocument(inputPdfPath: string): Promise<ExtractedDocument> {
  const data = new Uint8Array(await readFile(inputPdfPath));
  return extractDocumentFromBuffer(data);
}

export async function extractDocumentFromBuffer(data: Uint8Array): Promise<ExtractedDocument> {
  const pdf = await getDocument({ data, useSystemFonts: true }).promise;

  try {
    const pages: ExtractedPage[] = [];
    for (let i = 0; i < pdf.numPages; i++) {
      pages.push(await extractPage(await pdf.getPage(i + 1), i));
    }
    return { pages, outline: await extractOutlineMetadata(pdf) };
  } finally {
    await pdf.destroy();
  }
}

async function extractPage(page: PdfPage, pageIndex: number): Promise<ExtractedPage> {
  const viewport = page.getViewport({ scale: 1 });
  // The operator list has to be built first: it is what loads the page fonts into commonObjs.
  const operatorList = await page.getOperatorList();
  const textContent = await page.getTextContent();

  const spans: Span[] = [];
  for (const item of textContent.items) {
    if (!isPdfTextItem(item)) continue;
    const span = toSpan(item, viewport.height, lookupFontName(page, item.fontName));
    if (span) spans.push(span);
  }

  const blocks: PageBlock[] = [{ kind: "text", lines: groupSpansIntoLines(spans, viewport.width) }];
  const imageCount = operatorList.fnArray.filter((fn) => IMAGE_PAINT_OPERATORS.has(fn)).length;
  for (let i = 0; i < imageCount; i++) blocks.push({ kind: "image-or-table" });

  return { pageIndex, width: viewport.width, height: viewport.height, blocks };
}

function isPdfTextItem(item: unknown): item is PdfTextItem {
  return (
    typeof item === "object" &&
    item !== null &&
    "str" in item &&
    typeof item.str === "string" &&
    "transform" in item &&
    Array.isArray(item.transform) &&
    "width" in item &&
    typeof item.width === "number" &&
    "fontName" in item &&
    typeof item.fontName === "string"
  );
}

function isPdfFontInfo(value: unknown): value is PdfFontInfo {
  return typeof value === "object" && value !== null && "name" in value && typeof value.name === "string";
}

function lookupFontName(page: PdfPage, loadedName: string): string {
  if (!page.commonObjs.has(loadedName)) return loadedName;
  const font: unknown = page.commonObjs.get(loadedName);
  return isPdfFontInfo(font) ? font.name : loadedName;
}

export function fontFlagsFromName(fontName: string): number {
  let flags = 0;
  if (BOLD_FONT_NAME_PATTERN.test(fontName)) flags |= FONT_FLAG_BOLD;
  if (ITALIC_FONT_NAME_PATTERN.test(fontName)) flags |= FONT_FLAG_ITALIC;
  return flags;
}

export function toSpan(item: PdfTextItem, pageHeight: number, fontName: string): Span | undefined {
  if (item.str.trim().length === 0) return undefined;
  const [, , c, d, x, y] = item.transform;
  const size = roundFontSize(Math.hypot(c, d));
  const baselineY = pageHeight - y;
  const bbox: BoundingBox = [x, baselineY - size, x + item.width, baselineY];
  return { text: item.str, size, flags: fontFlagsFromName(fontName), bbox };
}

function roundFontSize(size: number): number {
  return Math.round(size * 100) / 100;
}

async function extractOutlineMetadata(pdf: PdfDocument): Promise<OutlineMetadataEntry[]> {
  const outline = await pdf.getOutline();
  const entries: OutlineMetadataEntry[] = [];

  const visit = async (nodes: PdfOutlineNode[], level: number): Promise<void> => {
    for (const node of nodes) {
      entries.push({ level, label: node.title, page: await resolveOutlinePage(pdf, node.dest) });
      await visit(node.items, level + 1);
    }
  };
  await visit(outline ?? [], 1);

  return entries;
}

async function resolveOutlinePage(pdf: PdfDocument, dest: unknown): Promise<number | undefined> {
  const explicitDest: unknown = typeof dest === "string" ? await pdf.getDestination(dest) : dest;
  if (!Array.isArray(explicitDest)) return undefined;
  const target: unknown = explicitDest[0];
  if (!isPdfRef(target)) return undefined;
  return (await pdf.getPageIndex(target)) + 1;
}

function isPdfRef(value: unknown): value is PdfRef {
  return (
    typeof value === "object" &&
    value !== null &&
    "num" in value &&
    typeof value.num === "number" &&
    "gen" in value &&
    typeof value.gen === "number"
  );
}

export const pdfExtractInternals = {
  fontFlagsFromName,
  isPdfTextItem,
  toSpan,
};
