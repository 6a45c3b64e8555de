import path from "node:path";
import { OutputDirs } from "../config";
import { isAbsoluteHttpUrl } from "../core/fetch";
import { ArtifactKind, ArtifactReference, MetadataRecord } from "../types";

const DEFAULT_DOCUMENT_EXTENSION = ".pdf";

export function referenceKey(kind: ArtifactKind, paperId: string): string {
  return `${kind}:${paperId}`;
}

// Keeps the extension the link points at; falls back to .pdf for odd or missing ones.
export function documentExtension(url: string): string {
  if (!isAbsoluteHttpUrl(url)) {
    return DEFAULT_DOCUMENT_EXTENSION;
  }
  const ext = path.posix.extname(new URL(url).pathname).toLowerCase();
  return /^\.[a-z0-9]{2,5}$/.test(ext) ? ext : DEFAULT_DOCUMENT_EXTENSION;
}

export function pdfReference(record: MetadataRecord, pdfDir: string): ArtifactReference | undefined {
  if (!record.documentReference) {
    return undefined;
  }
  return {
    key: referenceKey("pdf", record.paperId),
    paperId: record.paperId,
    kind: "pdf",
    url: record.documentReference,
    title: record.title,
    targetPath: path.resolve(pdfDir, `${record.paperId}${documentExtension(record.documentReference)}`),
  };
}

export function sourceReference(record: MetadataRecord, sourcesDir: string): ArtifactReference | undefined {
  if (!record.sourceIdentifierHint) {
    return undefined;
  }
  return {
    key: referenceKey("source", record.paperId),
    paperId: record.paperId,
    kind: "source",
    title: record.sourceIdentifierHint,
    targetPath: path.resolve(sourcesDir, `${record.paperId}.tar.gz`),
    extractDir: path.resolve(sourcesDir, record.paperId),
  };
}

export function buildReferences(
  records: MetadataRecord[],
  kind: ArtifactKind,
  dirs: Pick<OutputDirs, "pdfs" | "sources">,
): ArtifactReference[] {
  const references: ArtifactReference[] = [];
  for (const record of records) {
    const reference = kind === "pdf" ? pdfReference(record, dirs.pdfs) : sourceReference(record, dirs.sources);
    if (reference) {
      references.push(reference);
    }
  }
  return references;
}
