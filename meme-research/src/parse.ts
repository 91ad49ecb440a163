import { load, type CheerioAPI } from "cheerio";
import { childLogger } from "./logger";
import type { SearchHit } from "./types";
import { collapse, trimTo } from "./utils";

const log = childLogger("parse");

export const NO_ABOUT = "No description available";
export const NO_ORIGIN = "No origin information available";

export function parseSearchResults(html: string, baseUrl: string, limit = 5): SearchHit[] {
  const $ = load(html);
  const hits: SearchHit[] = [];

  $('a.item[href*="/memes/"]').each((_, a) => {
    if (hits.length >= limit) return false;
    const href = $(a).attr("href");
    if (!href) return;

    const text = $(a).text().trim();
    const title =
      $(a).attr("data-title")?.trim() ||
      (text ? collapse(text.split("\n")[0]) : "") ||
      "Unknown";

    let url: string;
    try {
      url = new URL(href, baseUrl).toString();
    } catch {
      log.warn({ event: "parse.href.invalid", href }, "Skipping search result with invalid link");
      return;
    }
    hits.push({ title, url });
  });

  return hits;
}

export type MemeSections = {
  about: string;
  origin: string;
};

export function parseMemePage(html: string, charCap = 800): MemeSections {
  const $ = load(html);
  return {
    about: sectionText($, "about", charCap) || NO_ABOUT,
    origin: sectionText($, "origin", charCap) || NO_ORIGIN,
  };
}

// The first paragraph after the heading, siblings only.
function sectionText($: CheerioAPI, id: string, charCap: number): string | undefined {
  const heading = $(`h2#${id}`).first();
  if (!heading.length) return undefined;
  return trimTo(heading.nextAll("p").first().text(), charCap);
}
