import { z } from "zod";
import type { LlmClient } from "./llm";
import { childLogger } from "./logger";
import type { CuratedRecord } from "./types";

const log = childLogger("curator");

export const UNAVAILABLE = "Information unavailable";

export const CURATOR_TEMPERATURE = 0.3;

export const CURATOR_SYSTEM_PROMPT = `You are a data curator. Extract and structure the key information from the raw meme data.

Your job is to:
1. Extract the most important facts about the meme
2. Identify origin information
3. Note key examples or usage patterns
4. Collect all URLs mentioned

Return ONLY a valid JSON object with these keys (no markdown, no extra text):
{
    "name": "Official meme name",
    "about": "What this meme is (2-3 sentences)",
    "origin": "Where it came from and when (2-3 sentences)",
    "usage": "How it's typically used (2-3 sentences)",
    "sources": ["url1", "url2", ...]
}

Be concise and factual. Only include information that appears in the raw data.
IMPORTANT: Return ONLY the JSON object, nothing else.`;

// Blank strings count as missing; other values are kept as written.
const text = z.unknown().transform((v) => (typeof v === "string" && v.trim() !== "" ? v : ""));

const CuratedSchema = z.object({
  name: text,
  about: text,
  origin: text,
  usage: text,
  sources: z
    .unknown()
    .transform((v) =>
      Array.isArray(v) ? v.filter((s): s is string => typeof s === "string" && s.trim() !== "") : [],
    ),
});

export function degradedRecord(topic: string): CuratedRecord {
  return { name: topic, about: UNAVAILABLE, origin: UNAVAILABLE, usage: UNAVAILABLE, sources: [] };
}

export function stripCodeFences(content: string): string {
  const trimmed = content.trim();
  if (!trimmed.startsWith("```")) return trimmed;
  return trimmed
    .replace(/^```[a-zA-Z]*/, "")
    .replace(/```$/, "")
    .trim();
}

/**
 * Turns model output into a record. Never throws: output that is not a JSON
 * object degrades to the sentinel record, and empty fields are defaulted one
 * by one.
 */
export function parseCuratedRecord(topic: string, content: string): CuratedRecord {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFences(content));
  } catch (err: unknown) {
    log.warn(
      { event: "curator.parse.fail", topic, error: err instanceof Error ? err.message : String(err) },
      "Curator output is not valid JSON",
    );
    return degradedRecord(topic);
  }

  const parsed = CuratedSchema.safeParse(json);
  if (!parsed.success) {
    log.warn({ event: "curator.parse.fail", topic, error: "not a JSON object" }, "Curator output is not a JSON object");
    return degradedRecord(topic);
  }

  const r = parsed.data;
  return {
    name: r.name || topic,
    about: r.about || UNAVAILABLE,
    origin: r.origin || UNAVAILABLE,
    usage: r.usage || UNAVAILABLE,
    sources: r.sources,
  };
}

export type Curator = {
  curate(topic: string, rawText: string): Promise<CuratedRecord>;
};

export function createCurator(llm: LlmClient, model?: string): Curator {
  return {
    async curate(topic, rawText) {
      const content = await llm.complete({
        system: CURATOR_SYSTEM_PROMPT,
        user: `Raw data:\n\n${rawText}`,
        temperature: CURATOR_TEMPERATURE,
        model,
      });
      const record = parseCuratedRecord(topic, content);
      log.info({ event: "curator.done", topic, name: record.name, sources: record.sources.length }, "Curated record ready");
      return record;
    },
  };
}
