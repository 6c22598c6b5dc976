import { describe, expect, it } from "vitest";
import { FONT_FLAG_BOLD, FONT_FLAG_ITALIC } from "./outline-types.ts";
import { extractOutline } from "./outline-extract.ts";
import { extractDocumentFromBuffer, pdfExtractInternals } from "./pdf-extract.ts";

describe("pdfExtractInternals", () => {
  it("derives style flags from the font name", () => {
    expect(pdfExtractInternals.fontFlagsFromName("ABCDEF+Arial-BoldMT")).toBe(FONT_FLAG_BOLD);
    expect(pdfExtractInternals.fontFlagsFromName("Times-Italic")).toBe(FONT_FLAG_ITALIC);
    expect(pdfExtractInternals.fontFlagsFromName("Helvetica-BoldOblique")).toBe(FONT_FLAG_BOLD | FONT_FLAG_ITALIC);
    expect(pdfExtractInternals.fontFlagsFromName("Helvetica")).toBe(0);
  });

  it("converts a text item into a top-down span", () => {
    const span = pdfExtractInternals.toSpan(
      { str: "Hello", transform: [12, 0, 0, 12, 50, 700], width: 20, fontName: "g_d0_f1" },
      792,
      "Arial-Bold",
    );
    expect(span).toEqual({ text: "Hello", size: 12, flags: FONT_FLAG_BOLD, bbox: [50, 80, 70, 92] });
  });

  it("skips whitespace-only items", () => {
    expect(
      pdfExtractInternals.toSpan({ str: "  ", transform: [12, 0, 0, 12, 0, 0], width: 4, fontName: "f" }, 792, "f"),
    ).toBeUndefined();
  });

  it("recognises pdf.js text items", () => {
    expect(
      pdfExtractInternals.isPdfTextItem({ str: "a", transform: [1, 0, 0, 1, 0, 0], width: 3, fontName: "f" }),
    ).toBe(true);
    expect(pdfExtractInternals.isPdfTextItem({ type: "beginMarkedContent" })).toBe(false);
  });
});

describe("extractDocumentFromBuffer", () => {
  it("reads spans with bold flags from the page fonts", async () => {
    const document = await extractDocumentFromBuffer(projectOverviewPdf());

    expect(document.pages).toHaveLength(1);
    expect(document.pages[0]).toMatchObject({ pageIndex: 0, width: 612, height: 792 });
    const lines = document.pages[0].blocks.flatMap((block) => (block.kind === "text" ? block.lines : []));
    expect(lines.map((line) => line.spans.map(({ text, size, flags }) => ({ text, size, flags })))).toEqual([
      [{ text: "Project Overview Report", size: 24, flags: FONT_FLAG_BOLD }],
      [{ text: "The project collects field notes from every site.", size: 12, flags: 0 }],
    ]);
  });

  it("turns each painted image into an image-or-table block", async () => {
    const document = await extractDocumentFromBuffer(projectOverviewPdf());

    expect(document.pages[0].blocks.filter((block) => block.kind === "image-or-table")).toEqual([
      { kind: "image-or-table" },
    ]);
  });

  it("flattens the bookmark tree with levels and 1-based pages", async () => {
    const document = await extractDocumentFromBuffer(projectOverviewPdf());

    expect(document.outline).toEqual([
      { level: 1, label: "Project Overview Report", page: 1 },
      { level: 2, label: "Scope", page: 1 },
    ]);
    expect(extractOutline(document).title).toBe("Project Overview Report");
  });
});

function projectOverviewPdf(): Uint8Array {
  const content = [
    "BT /F1 24 Tf 72 700 Td (Project Overview Report) Tj ET",
    "BT /F2 12 Tf 72 660 Td (The project collects field notes from every site.) Tj ET",
    "q 10 0 0 10 72 600 cm",
    "BI /W 1 /H 1 /BPC 8 /CS /G ID",
    "x",
    "EI Q",
  ].join("\n");

  return buildPdf([
    "<< /Type /Catalog /Pages 2 0 R /Outlines 7 0 R >>",
    "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
    "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 4 0 R /F2 5 0 R >> >> /Contents 6 0 R >>",
    "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica-Bold >>",
    "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>",
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
    "<< /Type /Outlines /First 8 0 R /Last 8 0 R /Count 2 >>",
    "<< /Title (Project Overview Report) /Parent 7 0 R /Dest [3 0 R /XYZ 0 792 0] /First 9 0 R /Last 9 0 R /Count 1 >>",
    "<< /Title (Scope) /Parent 8 0 R /Dest [3 0 R /Fit] >>",
  ]);
}

function buildPdf(objects: string[]): Uint8Array {
  let body = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((object, index) => {
    offsets.push(body.length);
    body += `${index + 1} 0 obj\n${object}\nendobj\n`;
  });

  const xrefOffset = body.length;
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  body += offsets.map((offset) => `${String(offset).padStart(10, "0")} 00000 n \n`).join("");
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return new TextEncoder().encode(body);
}
