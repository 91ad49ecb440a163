import { z } from "zod";
import type { Curator } from "./curator";
import { InvalidInputError } from "./errors";
import { auditVocabulary, type Explainer } from "./explainer";
import { childLogger } from "./logger";
import type { SourceFetcher } from "./search";
import {
  RegisterSchema,
  type CuratedState,
  type ExplainedState,
  type FetchedState,
  type PipelineInput,
  type PipelineStage,
} from "./types";

const log = childLogger("pipeline");

export const STAGES: readonly PipelineStage[] = ["fetch", "curate", "explain"];

export type StageObserver = (stage: PipelineStage, index: number, total: number) => void;

export type PipelineDeps = {
  fetcher: Pick<SourceFetcher, "search">;
  curator: Curator;
  explainer: Explainer;
};

const PipelineInputSchema = z.object({
  topic: z.string().trim().min(1, "topic is required"),
  register: RegisterSchema,
});

export function parsePipelineInput(input: unknown): PipelineInput {
  const parsed = PipelineInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidInputError("Invalid pipeline input", parsed.error.flatten().fieldErrors);
  }
  return parsed.data;
}

export async function fetchStage(deps: PipelineDeps, state: PipelineInput): Promise<FetchedState> {
  const outcome = await deps.fetcher.search(state.topic);
  log.info({ event: "pipeline.fetch", topic: state.topic, status: outcome.status, chars: outcome.text.length }, "Fetched raw data");
  return { ...state, rawData: outcome.text, fetchStatus: outcome.status, sources: [] };
}

export async function curateStage(deps: PipelineDeps, state: FetchedState): Promise<CuratedState> {
  const curated = await deps.curator.curate(state.topic, state.rawData);
  return { ...state, curated, sources: [...curated.sources] };
}

export async function explainStage(deps: PipelineDeps, state: CuratedState): Promise<ExplainedState> {
  const explanation = await deps.explainer.explain(state.curated, state.topic, state.register);
  const slang = auditVocabulary(explanation, state.register);
  if (slang.length > 0) {
    log.warn({ event: "pipeline.explain.slang", register: state.register, terms: slang }, "Explanation uses excluded slang");
  }
  return { ...state, explanation };
}

export type Pipeline = {
  run(input: PipelineInput, onStage?: StageObserver): Promise<ExplainedState>;
};

export function createPipeline(deps: PipelineDeps): Pipeline {
  return {
    async run(input, onStage) {
      const start = parsePipelineInput(input);
      const startTime = Date.now();
      const total = STAGES.length;

      onStage?.("fetch", 0, total);
      const fetched = await fetchStage(deps, start);
      onStage?.("curate", 1, total);
      const curated = await curateStage(deps, fetched);
      onStage?.("explain", 2, total);
      const explained = await explainStage(deps, curated);

      log.info(
        { event: "pipeline.done", topic: start.topic, register: start.register, durationMs: Date.now() - startTime },
        "Pipeline finished",
      );
      return explained;
    },
  };
}
