import { XMLParser } from "fast-xml-parser";
import { Dispatcher } from "undici";
import { ArtifactError, errorMessage } from "../core/errors";
import { defaultFetch, FetchFn } from "../core/fetch";
import { Pacer } from "../core/pacing";
import { IdentifierResolver } from "./types";

export interface ArxivResolverOptions {
  apiUrl: string;
  userAgent: string;
  timeoutMs: number;
  pacer: Pacer;
  dispatcher?: Dispatcher;
  fetchFn?: FetchFn;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
});

function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
}

function firstOf(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value;
}

export function buildArxivQueryUrl(apiUrl: string, cleanedTitle: string): string {
  const query = encodeURIComponent(`ti:"${cleanedTitle}"`);
  return `${apiUrl}?search_query=${query}&start=0&max_results=1`;
}

// Example id: http://arxiv.org/abs/2502.12345v2 -> 2502.12345v2, and
// http://arxiv.org/abs/hep-th/9901001v1 -> hep-th/9901001v1.
export function parseArxivId(idUrl: string): string | undefined {
  const match = idUrl.trim().match(/arxiv\.org\/abs\/(.+)$/);
  return match?.[1];
}

export function firstEntryId(xml: string): string | undefined {
  const feed = asRecord(asRecord(parser.parse(xml))?.feed);
  const entry = asRecord(firstOf(feed?.entry));
  const id = entry?.id;
  return typeof id === "string" ? parseArxivId(id) : undefined;
}

export function eprintUrl(eprintBaseUrl: string, arxivId: string): string {
  return `${eprintBaseUrl.replace(/\/+$/, "")}/${arxivId}`;
}

/**
 * Title search against the arXiv Atom API. Every call waits its turn on the
 * shared pacer first.
 */
export class ArxivResolver implements IdentifierResolver {
  constructor(private readonly options: ArxivResolverOptions) {}

  async resolve(cleanedTitle: string): Promise<string | undefined> {
    if (!cleanedTitle) {
      return undefined;
    }
    await this.options.pacer.wait();

    const url = buildArxivQueryUrl(this.options.apiUrl, cleanedTitle);
    const fetchFn = this.options.fetchFn ?? defaultFetch;
    let body: string;
    try {
      const response = await fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.options.userAgent,
          accept: "application/atom+xml",
        },
        dispatcher: this.options.dispatcher,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      if (!response.ok) {
        await response.body?.cancel();
        throw new ArtifactError(`arXiv search failed: HTTP ${response.status}`, "resolver", response.status, { url });
      }
      body = await response.text();
    } catch (error) {
      if (error instanceof ArtifactError) {
        throw error;
      }
      throw new ArtifactError(`arXiv search failed: ${errorMessage(error)}`, "resolver", undefined, { url });
    }

    return firstEntryId(body);
  }
}
