import pLimit from "p-limit";
import type { HtmlGetter } from "./http";
import { childLogger } from "./logger";

const log = childLogger("crawl");

export type PageResult = { url: string; html: string | null };

// Results keep the order of `urls`; a failed page yields `html: null`.
export async function fetchMany(getHtml: HtmlGetter, urls: string[], concurrency = 5): Promise<PageResult[]> {
  const limit = pLimit(concurrency);
  const tasks = urls.map((url) =>
    limit(async (): Promise<PageResult> => {
      try {
        return { url, html: await getHtml(url) };
      } catch (err: unknown) {
        log.warn({ event: "crawl.page.fail", url, error: err instanceof Error ? err.message : String(err) }, "Error fetching page");
        return { url, html: null };
      }
    }),
  );
  return Promise.all(tasks);
}
