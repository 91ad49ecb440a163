import type { LlmClient } from "./llm";
import { childLogger } from "./logger";
import { STYLE_POLICIES, renderStylePrompt } from "./styles";
import type { CuratedRecord, Register } from "./types";

const log = childLogger("explainer");

export const EXPLAINER_TEMPERATURE = 0.7;
export const CONTEXT_EXAMPLES = 8;

export interface LanguageContextSource {
  formatContext(register: Register, text: string, k?: number): Promise<string>;
}

export function buildExplainerPrompt(register: Register, languageContext: string): string {
  return `${renderStylePrompt(STYLE_POLICIES[register])}

IMPORTANT - Language Style Context:
${languageContext}

Use the language patterns above to inform your writing style. Incorporate appropriate keywords, phrases, and tone naturally into your explanation. Match the grammar and sentence structure typical of this generation.

Using the curated data provided:
1. Briefly introduce what the meme is and where it came from.
2. Explain what it means and how people use it.
3. Add a quick note on why people find it funny or relatable.

End with a "Sources" section in markdown format listing URLs used.`;
}

export function renderCurated(curated: CuratedRecord): string {
  return `Meme: ${curated.name}

About: ${curated.about}

Origin: ${curated.origin}

Usage: ${curated.usage}

Sources: ${curated.sources.join(", ")}`;
}

export function renderSources(sources: readonly string[]): string {
  return ["## Sources", ...sources.map((url) => `- ${url}`)].join("\n");
}

const SOURCES_HEADING = /^\s*(?:#{1,6}\s*|\*\*)?sources\b\s*(?:\*\*)?\s*:?\s*(?:\*\*)?\s*$/im;

export function stripSourcesSection(text: string): string {
  const match = SOURCES_HEADING.exec(text);
  return (match ? text.slice(0, match.index) : text).trimEnd();
}

export function withSources(text: string, sources: readonly string[]): string {
  const body = stripSourcesSection(text);
  return body ? `${body}\n\n${renderSources(sources)}` : renderSources(sources);
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Quoted spans, URLs and the sources section are not checked.
export function auditVocabulary(text: string, register: Register): string[] {
  const unquoted = stripSourcesSection(text)
    .replace(/https?:\/\/\S+/g, " ")
    .replace(/"[^"\n]*"|“[^”\n]*”/g, " ");
  return STYLE_POLICIES[register].avoidTerms.filter((term) =>
    new RegExp(`(^|[^a-z])${escapeRegExp(term)}($|[^a-z])`, "i").test(unquoted),
  );
}

export type Explainer = {
  explain(curated: CuratedRecord, topic: string, register: Register): Promise<string>;
};

export function createExplainer(llm: LlmClient, context: LanguageContextSource, model?: string): Explainer {
  return {
    async explain(curated, topic, register) {
      const languageContext = await context.formatContext(register, topic, CONTEXT_EXAMPLES);
      log.info({ event: "explainer.context", register, topic }, "Retrieved language context");

      const content = await llm.complete({
        system: buildExplainerPrompt(register, languageContext),
        user: renderCurated(curated),
        temperature: EXPLAINER_TEMPERATURE,
        model,
      });
      return withSources(content, curated.sources);
    },
  };
}
