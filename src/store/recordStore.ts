import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { errorMessage, RecordParseError, RecordStoreError } from "../core/errors";
import { normalizeTitle } from "../resolve/title";
import { MetadataRecord } from "../types";
import { RecordListing } from "./types";

const RecordFileSchema = z
  .object({
    Title: z.string().nullish(),
    PDF: z.string().nullish(),
    Abstract: z.string().nullish(),
    Topics: z.union([z.array(z.string()), z.string()]).nullish(),
  })
  .passthrough();

export function paperIdFromFile(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

export function parseRecordFile(filePath: string, raw: string): MetadataRecord {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new RecordParseError(filePath, errorMessage(error));
  }

  const result = RecordFileSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new RecordParseError(filePath, issue ? `${issue.path.join(".") || "record"}: ${issue.message}` : "invalid");
  }

  const data = result.data;
  const title = (data.Title ?? "").trim();
  const documentReference = data.PDF?.trim() || undefined;
  const topics = Array.isArray(data.Topics) ? data.Topics : data.Topics ? [data.Topics] : [];

  return {
    paperId: paperIdFromFile(filePath),
    sourcePath: filePath,
    title,
    documentReference,
    sourceIdentifierHint: normalizeTitle(title),
    abstract: data.Abstract ?? undefined,
    topics,
  };
}

/**
 * Reads every `*.json` record under `recordsDir` in file-name order. Records
 * that fail to parse are returned separately and never reach the pipeline.
 */
export async function listRecords(recordsDir: string): Promise<RecordListing> {
  const absoluteDir = path.resolve(recordsDir);
  let entries: string[];
  try {
    entries = await fs.promises.readdir(absoluteDir);
  } catch (error) {
    throw new RecordStoreError(absoluteDir, errorMessage(error));
  }

  const listing: RecordListing = { records: [], invalid: [] };
  const files = entries.filter((entry) => entry.endsWith(".json")).sort();

  for (const file of files) {
    const filePath = path.join(absoluteDir, file);
    try {
      const raw = await fs.promises.readFile(filePath, "utf-8");
      listing.records.push(parseRecordFile(filePath, raw));
    } catch (error) {
      listing.invalid.push({
        filePath,
        error: error instanceof RecordParseError ? error : new RecordParseError(filePath, errorMessage(error)),
      });
    }
  }

  return listing;
}
