import fs from "node:fs";

export const MIN_ARTIFACT_BYTES = 1024;

export type ValidityReason = "ok" | "missing" | "undersized";

export interface ValidityResult {
  satisfied: boolean;
  reason: ValidityReason;
  bytes: number;
}

function isMissingPathError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

async function statOrUndefined(filePath: string): Promise<fs.Stats | undefined> {
  try {
    return await fs.promises.stat(filePath);
  } catch (error) {
    if (isMissingPathError(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * A target counts as already fetched only when it is a regular file of at
 * least `minBytes`. Anything smaller is treated as a truncated download.
 */
export async function checkArtifact(filePath: string, minBytes = MIN_ARTIFACT_BYTES): Promise<ValidityResult> {
  const stats = await statOrUndefined(filePath);
  if (!stats || !stats.isFile()) {
    return { satisfied: false, reason: "missing", bytes: 0 };
  }
  if (stats.size < minBytes) {
    return { satisfied: false, reason: "undersized", bytes: stats.size };
  }
  return { satisfied: true, reason: "ok", bytes: stats.size };
}

export async function isSatisfied(filePath: string, minBytes = MIN_ARTIFACT_BYTES): Promise<boolean> {
  return (await checkArtifact(filePath, minBytes)).satisfied;
}

export async function isDirectorySatisfied(dirPath: string): Promise<boolean> {
  const stats = await statOrUndefined(dirPath);
  if (!stats || !stats.isDirectory()) {
    return false;
  }
  const entries = await fs.promises.readdir(dirPath);
  return entries.length > 0;
}
