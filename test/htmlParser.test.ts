import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { PipelineError } from "../src/core/errors";
import { extractPaperLinks, paperIdFromUrl, parsePaperPage } from "../src/crawl";

const pageUrl = "https://papers.test/miccai-2025/0042-Paper1234.html";

function fixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, "fixtures", name), "utf-8");
}

describe("extractPaperLinks", () => {
  it("collects each paper link once, as an absolute URL", () => {
    expect(extractPaperLinks(fixture("index-page.html"), "https://papers.test/miccai-2025/")).toEqual([
      { url: "https://papers.test/miccai-2025/0042-Paper1234.html", paperId: "0042-Paper1234" },
      { url: "https://papers.test/miccai-2025/0043-Paper2000.html", paperId: "0043-Paper2000" },
    ]);
  });
});

describe("paperIdFromUrl", () => {
  it("uses the last path segment without its extension", () => {
    expect(paperIdFromUrl("https://papers.test/miccai-2025/0042-Paper1234.html")).toBe("0042-Paper1234");
  });
});

describe("parsePaperPage", () => {
  it("extracts every field of a full paper page", () => {
    expect(parsePaperPage(fixture("paper-page.html"), pageUrl)).toEqual({
      Title: "Shape-Aware Segmentation of Tiny Structures",
      "Author(s)": ["Ada Example", "Alan Sample"],
      Abstract: "We segment tiny structures.",
      PDF: "https://papers.test/paper/0042_paper.pdf",
      BibTex: "@InProceedings{Example2025}",
      Topics: ["Segmentation", "Ultrasound"],
      Reviews: [
        { "Please describe the contribution": "A new loss.", Rating: "(4) Weak Accept" },
        { "Please describe the contribution": "Careful evaluation." },
      ],
      "Meta-review": [{ Decision: "Accept" }],
      "Author Feedback": "We thank the reviewers.",
      "Code Repository": "https://example.org/code",
      Dataset: "N/A",
    });
  });

  it("falls back to defaults when sections are missing", () => {
    const document = parsePaperPage("<html><head><title>Only A Title</title></head><body></body></html>", pageUrl);

    expect(document).toEqual({
      Title: "Only A Title",
      "Author(s)": [],
      Abstract: "",
      PDF: "",
      BibTex: "",
      Topics: [],
      Reviews: [],
      "Meta-review": [],
      "Author Feedback": "",
      "Code Repository": "N/A",
      Dataset: "N/A",
    });
  });

  it("refuses a page without any title", () => {
    expect(() => parsePaperPage("<html><body><p>nothing</p></body></html>", pageUrl)).toThrow(PipelineError);
  });
});
