import path from "node:path";
import { describe, expect, it } from "vitest";
import { buildReferences, documentExtension } from "../src/download";
import { MetadataRecord } from "../src/types";

function record(paperId: string, title: string, documentReference?: string): MetadataRecord {
  return {
    paperId,
    sourcePath: `/data/json/${paperId}.json`,
    title,
    documentReference,
    sourceIdentifierHint: title.toLowerCase(),
    topics: [],
  };
}

const dirs = { pdfs: "/data/pdf", sources: "/data/sources" };

describe("documentExtension", () => {
  it("keeps a plausible extension and falls back to .pdf", () => {
    expect(documentExtension("https://papers.test/paper/0042.PDF")).toBe(".pdf");
    expect(documentExtension("https://papers.test/paper/0042.zip")).toBe(".zip");
    expect(documentExtension("https://papers.test/paper/download")).toBe(".pdf");
    expect(documentExtension("paper/0042.zip")).toBe(".pdf");
  });
});

describe("buildReferences", () => {
  const records = [record("A", "Paper A", "https://papers.test/a.pdf"), record("B", "", undefined)];

  it("builds PDF references only for records with a link", () => {
    expect(buildReferences(records, "pdf", dirs)).toEqual([
      {
        key: "pdf:A",
        paperId: "A",
        kind: "pdf",
        url: "https://papers.test/a.pdf",
        title: "Paper A",
        targetPath: path.resolve("/data/pdf", "A.pdf"),
      },
    ]);
  });

  it("builds source references only for records with a title", () => {
    expect(buildReferences(records, "source", dirs)).toEqual([
      {
        key: "source:A",
        paperId: "A",
        kind: "source",
        title: "paper a",
        targetPath: path.resolve("/data/sources", "A.tar.gz"),
        extractDir: path.resolve("/data/sources", "A"),
      },
    ]);
  });
});
