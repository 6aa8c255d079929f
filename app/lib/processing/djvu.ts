/**
 * DjVu page helpers: page geometry, hidden text layers and bundling.
 * The heavy lifting is done by the DjVuLibre command line tools.
 */

import { StructuralError, ToolError, errorMessage, type ToolStage } from "../errors";
import type { PageSize } from "../types";
import type { ToolResult, ToolRunner } from "./tools";

const CONTROL_ESCAPES: Record<number, string> = {
  0x07: "\\a",
  0x08: "\\b",
  0x09: "\\t",
  0x0a: "\\n",
  0x0b: "\\v",
  0x0c: "\\f",
  0x0d: "\\r",
};

// INFO flag values for pages turned by 90 or 270 degrees
const QUARTER_TURNS = new Set([5, 6]);

const stderrSuffix = (result: ToolResult) => (result.stderr.trim() ? `: ${result.stderr.trim()}` : "");

async function runStage(
  stage: ToolStage,
  runTool: ToolRunner,
  command: string,
  args: string[],
): Promise<ToolResult> {
  try {
    return await runTool(command, args);
  } catch (error) {
    throw new ToolError(stage, `Could not run ${command}: ${errorMessage(error)}`, null);
  }
}

/**
 * Width and height from the INFO chunk of a single-page DjVu file
 * (`AT&TFORM` ... `DJVU`), as the page is displayed: a page stored with
 * a quarter-turn rotation has its dimensions swapped.
 */
export function readPageSize(buffer: Buffer): PageSize {
  if (
    buffer.length < 16 ||
    buffer.toString("latin1", 0, 8) !== "AT&TFORM" ||
    buffer.toString("latin1", 12, 16) !== "DJVU"
  ) {
    throw new StructuralError("Not a single-page DjVu file");
  }

  let offset = 16;
  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString("latin1", offset, offset + 4);
    const chunkSize = buffer.readUInt32BE(offset + 4);
    const dataStart = offset + 8;

    if (chunkId === "INFO") {
      if (chunkSize < 4 || dataStart + 4 > buffer.length) {
        throw new StructuralError("Truncated DjVu INFO chunk");
      }
      const width = buffer.readUInt16BE(dataStart);
      const height = buffer.readUInt16BE(dataStart + 2);
      const rotation =
        chunkSize >= 10 && dataStart + 10 <= buffer.length
          ? buffer.readUInt8(dataStart + 9) & 0x07
          : 1;
      return QUARTER_TURNS.has(rotation) ? { width: height, height: width } : { width, height };
    }

    // Chunks are padded to even length
    offset = dataStart + chunkSize + (chunkSize % 2);
  }

  throw new StructuralError("DjVu page has no INFO chunk");
}

/**
 * Quote `text` as a DjVu s-expression string. Non-ASCII characters are
 * written as octal escapes of their UTF-8 bytes.
 */
export function toSexpString(text: string): string {
  let out = '"';
  for (const byte of Buffer.from(text, "utf-8")) {
    if (byte === 0x22) {
      out += '\\"';
    } else if (byte === 0x5c) {
      out += "\\\\";
    } else if (CONTROL_ESCAPES[byte]) {
      out += CONTROL_ESCAPES[byte];
    } else if (byte < 0x20 || byte >= 0x7f) {
      out += "\\" + byte.toString(8).padStart(3, "0");
    } else {
      out += String.fromCharCode(byte);
    }
  }
  return out + '"';
}

/**
 * djvused script that puts `text` over the whole first page.
 */
export function buildTextLayerScript(size: PageSize, text: string): string {
  const expression = `(page 0 0 ${size.width - 1} ${size.height - 1} ${toSexpString(text)})`;
  return `select 1; set-txt; ${expression}`;
}

export async function setTextLayer(
  pageFile: string,
  size: PageSize,
  text: string,
  runTool: ToolRunner,
  command = "djvused",
): Promise<void> {
  const script = buildTextLayerScript(size, text);
  const result = await runStage("text-layer", runTool, command, ["-s", "-e", script, pageFile]);
  if (result.exitCode !== 0) {
    throw new ToolError(
      "text-layer",
      `Failed to create DjVu text layer for ${pageFile} (exit code ${result.exitCode})${stderrSuffix(result)}`,
      result.exitCode,
    );
  }
}

/**
 * Bundle single-page files into one multi-page document, in the given order.
 */
export async function mergePages(
  outFile: string,
  pageFiles: readonly string[],
  runTool: ToolRunner,
  command = "djvm",
): Promise<void> {
  const result = await runStage("merge", runTool, command, ["-c", outFile, ...pageFiles]);
  if (result.exitCode !== 0) {
    throw new ToolError(
      "merge",
      `Failed to merge pages into single DjVu file (exit code ${result.exitCode})${stderrSuffix(result)}`,
      result.exitCode,
    );
  }
}
