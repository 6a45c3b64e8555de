import { CheerioAPI, load } from "cheerio";
import type { Element } from "domhandler";
import { PipelineError } from "../core/errors";
import { PaperDocument, PaperLink, ReviewEntry } from "../types";

const NOT_AVAILABLE = "N/A";

function normalizeUrl(baseUrl: string, href: string): string {
  return new URL(href, baseUrl).toString();
}

export function paperIdFromUrl(url: string): string {
  const lastSegment = new URL(url).pathname.split("/").filter(Boolean).pop() ?? "";
  return decodeURIComponent(lastSegment).replace(/\.html?$/i, "");
}

export function extractPaperLinks(html: string, pageUrl: string): PaperLink[] {
  const $ = load(html);
  const links: PaperLink[] = [];
  const seen = new Set<string>();

  $("a[href*='-Paper']").each((_, element) => {
    const href = $(element).attr("href")?.trim();
    if (!href) {
      return;
    }

    const url = normalizeUrl(pageUrl, href);
    if (seen.has(url)) {
      return;
    }

    const paperId = paperIdFromUrl(url);
    if (!paperId) {
      return;
    }
    seen.add(url);
    links.push({ url, paperId });
  });

  return links;
}

/**
 * Document-order view of a page, for "first X after Y" lookups. Descendants
 * of Y count as after Y.
 */
class OrderedPage {
  readonly elements: Element[];
  private readonly positions = new Map<Element, number>();

  constructor(private readonly $: CheerioAPI) {
    this.elements = $<Element, string>("*").toArray();
    this.elements.forEach((element, index) => this.positions.set(element, index));
  }

  text(element: Element | undefined): string {
    return element ? this.$(element).text().trim() : "";
  }

  indexOf(element: Element): number {
    return this.positions.get(element) ?? -1;
  }

  findNext(from: Element | undefined, matches: (element: Element) => boolean): Element | undefined {
    if (!from) {
      return undefined;
    }
    const start = this.indexOf(from);
    if (start < 0) {
      return undefined;
    }
    for (let index = start + 1; index < this.elements.length; index += 1) {
      if (matches(this.elements[index])) {
        return this.elements[index];
      }
    }
    return undefined;
  }

  findNextTag(from: Element | undefined, tagName: string): Element | undefined {
    return this.findNext(from, (element) => element.tagName === tagName);
  }
}

function isHeading(element: Element): boolean {
  return element.tagName === "h1" || element.tagName === "h2" || element.tagName === "h3";
}

// Each review is a heading followed by <strong> labels, each answered by the next <blockquote>.
function extractReviewBlocks(page: OrderedPage, headingTag: string, marker: RegExp): ReviewEntry[] {
  const reviews: ReviewEntry[] = [];
  const headings = page.elements.filter((element) => element.tagName === headingTag && marker.test(page.text(element)));

  for (const heading of headings) {
    const review: ReviewEntry = {};
    for (let index = page.indexOf(heading) + 1; index < page.elements.length; index += 1) {
      const current = page.elements[index];
      if (isHeading(current)) {
        break;
      }
      if (current.tagName !== "strong") {
        continue;
      }
      const key = page.text(current);
      const answer = page.findNextTag(current, "blockquote");
      if (key && answer) {
        review[key] = page.text(answer);
      }
    }
    if (Object.keys(review).length > 0) {
      reviews.push(review);
    }
  }

  return reviews;
}

function uniqueInOrder(values: string[]): string[] {
  return [...new Set(values.filter(Boolean))];
}

export function parsePaperPage(html: string, pageUrl: string): PaperDocument {
  const $ = load(html);
  const page = new OrderedPage($);
  const byId = (id: string): Element | undefined => $(`h1#${id}`).get(0);

  const title = page.text($("h1.post-title").get(0)) || page.text($("title").get(0));
  if (!title) {
    throw new PipelineError(`Could not find paper title on ${pageUrl}`, { pageUrl });
  }

  const authors = $("div.post-tags")
    .first()
    .find("a.post-category")
    .toArray()
    .map((element) => page.text(element))
    .filter(Boolean);

  const abstractHeading = $("h1")
    .toArray()
    .find((element) => page.text(element) === "Abstract");

  const pdfAnchor = page.findNext(
    byId("link-id"),
    (element) => element.tagName === "a" && /\.pdf$/i.test($(element).attr("href") ?? ""),
  );
  const pdfHref = pdfAnchor ? $(pdfAnchor).attr("href") : undefined;

  const topics = uniqueInOrder(
    $("div.post-categories a.post-category")
      .toArray()
      .map((element) => page.text(element)),
  );

  return {
    Title: title,
    "Author(s)": authors,
    Abstract: page.text(page.findNextTag(abstractHeading, "p")),
    PDF: pdfHref ? normalizeUrl(pageUrl, pdfHref) : "",
    BibTex: page.text(page.findNextTag(byId("bibtex-id"), "code")),
    Topics: topics,
    Reviews: extractReviewBlocks(page, "h3", /Review #/),
    "Meta-review": extractReviewBlocks(page, "h2", /Meta-review #/),
    "Author Feedback": page.text(page.findNextTag(byId("authorFeedback-id"), "blockquote")),
    "Code Repository": page.text(page.findNextTag(byId("code-id"), "p")) || NOT_AVAILABLE,
    Dataset: page.text(page.findNextTag(byId("dataset-id"), "p")) || NOT_AVAILABLE,
  };
}
