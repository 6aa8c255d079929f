/**
 * Error types raised while turning a manifest into a book.
 * Every one of them is fatal for the current input file only.
 */

export class FetcherError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Manifest or catalog record does not have the expected shape. */
export class StructuralError extends FetcherError {}

export class UnknownLanguageError extends FetcherError {
  readonly code: string;

  constructor(code: string) {
    super(`Unknown language code: ${code}`);
    this.code = code;
  }
}

export type ToolStage = "merge" | "text-layer";

export class ToolError extends FetcherError {
  readonly stage: ToolStage;
  readonly exitCode: number | null;

  constructor(stage: ToolStage, message: string, exitCode: number | null) {
    super(message);
    this.stage = stage;
    this.exitCode = exitCode;
  }
}

export class RetrievalError extends FetcherError {
  readonly url: string;
  readonly status: number;

  constructor(url: string, status: number, statusText: string) {
    super(`Failed to download ${url}: ${status} ${statusText}`.trimEnd());
    this.url = url;
    this.status = status;
  }
}

export class ConfigError extends FetcherError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
