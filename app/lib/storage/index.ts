import { mkdtemp, readdir, rm } from "fs/promises";
import { tmpdir } from "os";
import { basename, extname, join } from "path";

/**
 * Scratch directory for downloaded page files. One directory serves a
 * whole batch; it is emptied between manifests.
 */
export async function createScratchDir(prefix = "get-djvu-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function clearScratchDir(dir: string): Promise<void> {
  const entries = await readdir(dir);
  await Promise.all(
    entries.map((entry) => rm(join(dir, entry), { recursive: true, force: true })),
  );
}

export async function removeScratchDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Output path for a manifest: its base name with the last extension
 * replaced, placed in `outputDir`.
 */
export function outputPathFor(manifestPath: string, extension: string, outputDir = "."): string {
  const stem = basename(manifestPath, extname(manifestPath));
  return join(outputDir, `${stem}.${extension}`);
}
