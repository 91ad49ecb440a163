import { fetchMany } from "./crawl";
import type { HtmlGetter } from "./http";
import { childLogger } from "./logger";
import { parseMemePage, parseSearchResults } from "./parse";
import type { FetchOutcome, RawCandidate } from "./types";

const log = childLogger("search");

const SEPARATOR = "-".repeat(70);

export type SourceFetcherOptions = {
  getHtml: HtmlGetter;
  baseUrl?: string;
  resultLimit?: number;
  concurrency?: number;
  fieldCharCap?: number;
  /** How many candidates make it into the text blob. */
  blobLimit?: number;
};

export type SourceFetcher = {
  search(topic: string): Promise<FetchOutcome>;
  fetchSourceText(topic: string): Promise<string>;
};

export function noResultsText(topic: string): string {
  return `No results found on Know Your Meme for '${topic}'.`;
}

export function formatCandidates(topic: string, candidates: readonly RawCandidate[]): string {
  let output = `Know Your Meme results for '${topic}':\n\n`;
  candidates.forEach((c, i) => {
    output += `${i + 1}. ${c.title}\n`;
    output += `   URL: ${c.url}\n\n`;
    output += `   ABOUT:\n   ${c.about}\n\n`;
    if (c.origin) output += `   ORIGIN:\n   ${c.origin}\n\n`;
    output += `${SEPARATOR}\n\n`;
  });
  return output;
}

export function createSourceFetcher({
  getHtml,
  baseUrl = "https://knowyourmeme.com",
  resultLimit = 5,
  concurrency = 5,
  fieldCharCap = 800,
  blobLimit = 3,
}: SourceFetcherOptions): SourceFetcher {
  async function search(topic: string): Promise<FetchOutcome> {
    let searchHtml: string;
    try {
      searchHtml = await getHtml(new URL("/search", baseUrl).toString(), { q: topic });
    } catch (err: unknown) {
      const error = err instanceof Error ? err.message : String(err);
      log.error({ event: "search.request.fail", topic, error }, "Search request failed");
      return { status: "transport-failure", text: `Error searching Know Your Meme: ${error}`, error };
    }

    const hits = parseSearchResults(searchHtml, baseUrl, resultLimit);
    const pages = await fetchMany(
      getHtml,
      hits.map((h) => h.url),
      concurrency,
    );

    const candidates: RawCandidate[] = [];
    pages.forEach((page, i) => {
      if (page.html === null) return;
      const { about, origin } = parseMemePage(page.html, fieldCharCap);
      candidates.push({ title: hits[i].title, url: page.url, about, origin });
    });

    log.info({ event: "search.done", topic, hits: hits.length, resolved: candidates.length }, "Search finished");

    if (candidates.length === 0) {
      return { status: "no-results", text: noResultsText(topic) };
    }
    return {
      status: "ok",
      text: formatCandidates(topic, candidates.slice(0, blobLimit)),
      candidates,
    };
  }

  return {
    search,
    async fetchSourceText(topic) {
      return (await search(topic)).text;
    },
  };
}
