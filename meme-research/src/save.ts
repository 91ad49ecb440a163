import { writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { ExplainedState } from "./types";
import { sanitizeKeyword } from "./utils";

export function makeFilename(topic: string, date = new Date()): string {
  return `${date.toISOString().slice(0, 10)} ${sanitizeKeyword(topic)}.md`;
}

export function renderMarkdown(state: Pick<ExplainedState, "topic" | "curated" | "explanation">): string {
  return `# ${state.curated.name || state.topic}\n\n${state.explanation}\n`;
}

export async function saveExplanation(
  state: Pick<ExplainedState, "topic" | "curated" | "explanation">,
  dir = "data/out",
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, makeFilename(state.topic));
  await writeFile(path, renderMarkdown(state), "utf-8");
  return path;
}
