#!/usr/bin/env tsx
/**
 * Download books described by METS manifests into single DjVu files and
 * print a Wikimedia Commons {{Book}} description for each.
 *
 *   get-djvu [options] <manifests...>
 */

import { Command, InvalidArgumentError } from "commander";
import { runBatch } from "../app/lib/batch";
import { loadConfig, type FetcherConfig } from "../app/lib/config";
import { errorMessage } from "../app/lib/errors";

interface CliOptions {
  delay?: number;
  charset?: string;
  outputDir?: string;
  requireStructmap?: boolean;
  quiet?: boolean;
}

function parseDelay(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Delay must be a non-negative number of milliseconds.");
  }
  return parsed;
}

const program = new Command();

program
  .name("get-djvu")
  .description("Build DjVu books from digital library METS manifests")
  .argument("<manifests...>", "METS manifest files, processed in order")
  .option("-d, --delay <ms>", "pause between page downloads", parseDelay)
  .option("-c, --charset <name>", "charset used to decode text layers")
  .option("-o, --output-dir <dir>", "directory for the merged DjVu files")
  .option("--require-structmap", "fail manifests without a page structure map")
  .option("-q, --quiet", "do not print progress")
  .action(async (manifests: string[], options: CliOptions) => {
    const overrides: Partial<FetcherConfig> = {
      pageDelayMs: options.delay,
      textCharset: options.charset,
      outputDir: options.outputDir,
      requireStructMap: options.requireStructmap,
      quiet: options.quiet,
    };

    let config: FetcherConfig;
    try {
      config = loadConfig(process.env, overrides);
    } catch (error) {
      console.error(errorMessage(error));
      process.exitCode = 2;
      return;
    }

    const summary = await runBatch(manifests, { config });
    if (!config.quiet) {
      console.error(
        `[Batch] ${summary.done} done, ${summary.skipped} skipped, ${summary.failed} failed`,
      );
    }
    process.exitCode = summary.failed > 0 ? 1 : 0;
  });

await program.parseAsync();
