import fs from "node:fs";
import path from "node:path";
import { x as extractTar } from "tar";
import { ArtifactError, errorMessage } from "../core/errors";
import { Logger } from "../observability";

async function extractInto(bundlePath: string, scratchDir: string): Promise<number> {
  await fs.promises.rm(scratchDir, { recursive: true, force: true });
  await fs.promises.mkdir(scratchDir, { recursive: true });
  await extractTar({ file: bundlePath, cwd: scratchDir, strict: true });
  const entries = await fs.promises.readdir(scratchDir);
  if (entries.length === 0) {
    throw new ArtifactError(`Archive ${path.basename(bundlePath)} contained no entries`, "archive");
  }
  return entries.length;
}

/**
 * Unpacks a gzip tarball into `destDir`. Extraction happens in a sibling
 * scratch directory, so `destDir` only ever holds a complete tree. The bundle
 * is never removed.
 */
export async function materializeArchive(bundlePath: string, destDir: string, logger?: Logger): Promise<boolean> {
  const scratchDir = `${destDir}.partial`;
  try {
    const entries = await extractInto(bundlePath, scratchDir);
    await fs.promises.rm(destDir, { recursive: true, force: true });
    await fs.promises.rename(scratchDir, destDir);
    logger?.info("archive_extracted", { bundlePath, destDir, entries });
    return true;
  } catch (error) {
    await fs.promises.rm(scratchDir, { recursive: true, force: true });
    logger?.error("archive_extract_failed", {
      bundlePath,
      destDir,
      errorKind: "archive",
      error: errorMessage(error),
    });
    return false;
  }
}
