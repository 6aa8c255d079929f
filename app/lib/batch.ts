import type { FetcherConfig } from "./config";
import { loadManifest, extractPages } from "./manifest";
import { describeManifest } from "./metadata";
import { renderBookTemplate } from "./metadata/template";
import { createConsoleLogger, type Logger } from "./logger";
import { PAGE_EXTENSION, assemblePages } from "./processing";
import type { FetchLike } from "./processing/fetch";
import type { ToolRunner } from "./processing/tools";
import { clearScratchDir, createScratchDir, outputPathFor, removeScratchDir } from "./storage";
import type { FileResult } from "./types";

export interface BatchContext {
  config: FetcherConfig;
  fetch?: FetchLike;
  runTool?: ToolRunner;
  logger?: Logger;
  /** Receives the output file name and description of finished books */
  write?: (text: string) => void;
}

export interface BatchSummary {
  results: FileResult[];
  done: number;
  skipped: number;
  failed: number;
}

const writeStdout = (text: string) => {
  console.log(text);
};

/**
 * Turn one manifest into a DjVu file and print its description.
 * Errors propagate; `runBatch` isolates them per file.
 */
export async function processManifest(
  file: string,
  scratchDir: string,
  ctx: BatchContext,
): Promise<FileResult> {
  const { config } = ctx;
  const logger = ctx.logger ?? createConsoleLogger({ quiet: config.quiet });
  const write = ctx.write ?? writeStdout;

  const manifest = await loadManifest(file);
  const extraction = extractPages(manifest, {
    requireStructMap: config.requireStructMap,
    onWarning: (message) => logger.warn(`[Manifest] ${message}`),
  });

  if (extraction.status === "empty") {
    const reason = `No DJVU pages found in ${file}`;
    write(reason);
    return { file, status: "skipped", reason };
  }

  const { pages } = extraction;
  const withText = pages.filter((page) => page.text !== null).length;
  logger.info(`[Manifest] ${file}: ${pages.length} pages, ${withText} with text`);

  // Described before downloading so a bad record fails fast
  const description = renderBookTemplate(describeManifest(manifest, config));

  const outFile = outputPathFor(file, PAGE_EXTENSION, config.outputDir);
  const result = await assemblePages(pages, {
    scratchDir,
    outFile,
    settings: config,
    fetch: ctx.fetch,
    runTool: ctx.runTool,
    onProgress: ({ processed, total, hasText }) => {
      logger.info(`[Pages] ${processed}/${total}${hasText ? " (with text)" : ""}`);
    },
  });
  logger.info(`[Merge] Wrote ${result.pageCount} pages to ${result.outFile}`);

  write(result.outFile);
  write(description);
  write("");

  return {
    file,
    status: "done",
    outFile: result.outFile,
    description,
    pageCount: result.pageCount,
  };
}

/**
 * Process manifests one after another. A failing manifest is logged and
 * skipped; the scratch directory is emptied after every manifest and
 * removed when the batch ends.
 */
export async function runBatch(files: readonly string[], ctx: BatchContext): Promise<BatchSummary> {
  const logger = ctx.logger ?? createConsoleLogger({ quiet: ctx.config.quiet });
  const scratchDir = await createScratchDir();
  const results: FileResult[] = [];

  try {
    for (const file of files) {
      try {
        results.push(await processManifest(file, scratchDir, { ...ctx, logger }));
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        logger.error(`[Batch] Failed to process ${file}`, failure);
        results.push({ file, status: "failed", error: failure });
      } finally {
        await clearScratchDir(scratchDir);
      }
    }
  } finally {
    await removeScratchDir(scratchDir);
  }

  return {
    results,
    done: results.filter((r) => r.status === "done").length,
    skipped: results.filter((r) => r.status === "skipped").length,
    failed: results.filter((r) => r.status === "failed").length,
  };
}
