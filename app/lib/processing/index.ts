import { rm } from "fs/promises";
import { join } from "path";
import { extension } from "mime-types";

import type { FetcherConfig } from "../config";
import { StructuralError } from "../errors";
import { IMAGE_GROUP } from "../manifest";
import type { AssemblyResult, PageEntry } from "../types";
import { mergePages, readPageSize, setTextLayer } from "./djvu";
import { downloadText, downloadToFile, type FetchLike } from "./fetch";
import { spawnTool, type ToolRunner } from "./tools";
import { pageFileName, sleep } from "./utils";

export const PAGE_EXTENSION = extension(IMAGE_GROUP.mimeType) || "djvu";

export type AssemblySettings = Pick<
  FetcherConfig,
  "pageDelayMs" | "textCharset" | "mergeCommand" | "textLayerCommand" | "maxPages"
>;

export interface PageProgress {
  page: PageEntry;
  processed: number;
  total: number;
  hasText: boolean;
}

export interface AssemblyOptions {
  scratchDir: string;
  outFile: string;
  settings: AssemblySettings;
  fetch?: FetchLike;
  runTool?: ToolRunner;
  onProgress?: (progress: PageProgress) => void;
}

/**
 * Download every page into the scratch directory, attach its text layer,
 * and merge the pages into `outFile`.
 *
 * Pages are handled strictly one after another in manifest order, with a
 * pause between downloads. Any failure aborts the whole document.
 */
export async function assemblePages(
  pages: readonly PageEntry[],
  options: AssemblyOptions,
): Promise<AssemblyResult> {
  const { scratchDir, outFile, settings } = options;
  const fetchImpl = options.fetch ?? fetch;
  const runTool = options.runTool ?? spawnTool;

  if (pages.length === 0) {
    throw new StructuralError("No pages to merge");
  }
  if (pages.length > settings.maxPages) {
    throw new StructuralError(
      `Document has ${pages.length} pages, more than the limit of ${settings.maxPages}`,
    );
  }

  const pageFiles: string[] = [];

  for (const [index, page] of pages.entries()) {
    if (index > 0) {
      await sleep(settings.pageDelayMs);
    }

    const pageFile = join(scratchDir, pageFileName(index + 1, pages.length, PAGE_EXTENSION));
    const image = await downloadToFile(page.image.url, pageFile, fetchImpl);

    if (page.text) {
      const text = await downloadText(page.text.url, settings.textCharset, fetchImpl);
      await setTextLayer(
        pageFile,
        readPageSize(image),
        text,
        runTool,
        settings.textLayerCommand,
      );
    }

    pageFiles.push(pageFile);
    options.onProgress?.({
      page,
      processed: index + 1,
      total: pages.length,
      hasText: page.text !== null,
    });
  }

  try {
    await mergePages(outFile, pageFiles, runTool, settings.mergeCommand);
  } catch (error) {
    // The merge tool may have written part of the output before failing
    await rm(outFile, { force: true });
    throw error;
  }

  return { outFile, pageFiles, pageCount: pageFiles.length };
}
