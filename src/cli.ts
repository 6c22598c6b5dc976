#!/usr/bin/env node

import { Command } from "commander";
import { writeJsonFile } from "./file-access.ts";
import type { OutlineLogger } from "./outline-batch.ts";
import { extractOutlinesFromDirectory } from "./outline-batch.ts";
import { extractPdfOutline, toOutlineOutput } from "./outline-extract.ts";

const DEFAULT_INPUT_DIR = process.env.PDF_OUTLINE_INPUT_DIR ?? "/app/input";
const DEFAULT_OUTPUT_DIR = process.env.PDF_OUTLINE_OUTPUT_DIR ?? "/app/output";

const program = new Command();

program
  .name("pdf-outline")
  .description("Extract a title and H1-H3 heading outline from PDF files")
  .showHelpAfterError();

program
  .command("outline")
  .description("Extract the outline of one PDF and print it, or write it to a JSON file")
  .argument("<pdfPath>", "Path to input PDF file")
  .argument("[outputJsonPath]", "Path to output JSON file")
  .action(async (pdfPath: string, outputJsonPath: string | undefined) => {
    const result = await extractPdfOutline(pdfPath);
    if (!result.ok) console.error(result.error.message);

    const output = toOutlineOutput(result);
    if (outputJsonPath) {
      await writeJsonFile(outputJsonPath, output);
      console.log(`Generated outline file at ${outputJsonPath}`);
    } else {
      console.log(JSON.stringify(output, null, 2));
    }
    if (!result.ok) process.exitCode = 1;
  });

program
  .command("batch")
  .description("Extract outlines for every PDF in a directory into <name>.json files")
  .argument("[inputDir]", "Directory containing PDF files", DEFAULT_INPUT_DIR)
  .argument("[outputDir]", "Directory for JSON outlines", DEFAULT_OUTPUT_DIR)
  .option("-q, --quiet", "Only report warnings and errors")
  .action(async (inputDir: string, outputDir: string, options: { quiet?: boolean }) => {
    const logger: OutlineLogger = options.quiet
      ? { info: () => {}, warn: console.warn, error: console.error }
      : console;
    const { processed } = await extractOutlinesFromDirectory(
      { inputDirPath: inputDir, outputDirPath: outputDir },
      { logger },
    );
    logger.info(`Extracted ${processed.length} outline file(s) into ${outputDir}`);
  });

program.action(() => {
  program.outputHelp();
});

void program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
