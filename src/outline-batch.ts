import { join, parse, resolve } from "node:path";
import { assertDirectory, listPdfFiles, writeJsonFile } from "./file-access.ts";
import type { OutlineResult } from "./outline-extract.ts";
import { extractPdfOutline, toOutlineOutput } from "./outline-extract.ts";

export interface OutlineLogger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export interface ExtractOutlinesInput {
  inputDirPath: string;
  outputDirPath: string;
}

export interface ProcessedDocument {
  inputPdfPath: string;
  outputJsonPath: string;
  title: string;
  headingCount: number;
  ok: boolean;
}

export interface ExtractOutlinesResult {
  processed: ProcessedDocument[];
}

export interface ExtractOutlinesDependencies {
  assertDirectory: (dirPath: string) => Promise<void>;
  listPdfFiles: (dirPath: string) => Promise<string[]>;
  extractPdfOutline: (inputPdfPath: string) => Promise<OutlineResult>;
  writeJsonFile: (filePath: string, value: unknown) => Promise<void>;
  logger: OutlineLogger;
}

const defaultDependencies: ExtractOutlinesDependencies = {
  assertDirectory,
  listPdfFiles,
  extractPdfOutline: (inputPdfPath) => extractPdfOutline(inputPdfPath),
  writeJsonFile,
  logger: console,
};

export function getOutputJsonPath(inputPdfPath: string, outputDirPath: string): string {
  return join(outputDirPath, `${parse(inputPdfPath).name}.json`);
}

/**
 * Writes `<name>.json` for every PDF in the input directory. Documents are
 * handled one after another; a failed document gets the error outline and the
 * batch moves on.
 */
export async function extractOutlinesFromDirectory(
  { inputDirPath, outputDirPath }: ExtractOutlinesInput,
  overrides: Partial<ExtractOutlinesDependencies> = {},
): Promise<ExtractOutlinesResult> {
  const dependencies = { ...defaultDependencies, ...overrides };
  const { logger } = dependencies;
  const resolvedInputDirPath = resolve(inputDirPath);
  const resolvedOutputDirPath = resolve(outputDirPath);

  await dependencies.assertDirectory(resolvedInputDirPath);
  const pdfPaths = await dependencies.listPdfFiles(resolvedInputDirPath);
  if (pdfPaths.length === 0) {
    logger.warn(`No PDF files found in ${resolvedInputDirPath}`);
    return { processed: [] };
  }
  logger.info(`Found ${pdfPaths.length} PDF file(s) to process`);

  const processed: ProcessedDocument[] = [];
  for (const inputPdfPath of pdfPaths) {
    const result = await dependencies.extractPdfOutline(inputPdfPath);
    if (!result.ok) logger.error(result.error.message);

    const output = toOutlineOutput(result);
    const outputJsonPath = getOutputJsonPath(inputPdfPath, resolvedOutputDirPath);
    try {
      await dependencies.writeJsonFile(outputJsonPath, output);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      logger.error(`Could not write ${outputJsonPath}: ${message}`);
      continue;
    }

    const stats = result.ok ? `${result.stats.pageCount} page(s), body font ${result.stats.bodyFontSize}pt, ` : "";
    logger.info(
      `${parse(inputPdfPath).base}: ${stats}"${output.title}", ${output.outline.length} heading(s) -> ${parse(outputJsonPath).base}`,
    );
    processed.push({
      inputPdfPath,
      outputJsonPath,
      title: output.title,
      headingCount: output.outline.length,
      ok: result.ok,
    });
  }

  return { processed };
}
