/**
 * Utility functions for processing operations
 */

/**
 * Wait for `ms` milliseconds. Used to keep page downloads polite.
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Zero-padded page counter: at least four digits, wider for longer books
 * so the files still sort in page order.
 */
export function pageFileName(pageNumber: number, pageCount: number, extension: string): string {
  const width = Math.max(4, String(pageCount).length);
  return `page-${String(pageNumber).padStart(width, "0")}.${extension}`;
}
