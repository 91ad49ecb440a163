import { ChromaBackend } from "./chroma";
import { createCurator } from "./curator";
import type { AppConfig } from "./env";
import { createExplainer } from "./explainer";
import { createHtmlGetter } from "./http";
import { createLlmClient } from "./llm";
import { childLogger } from "./logger";
import { createPipeline, type Pipeline } from "./pipeline";
import { RegisterStore, loadBuiltinExamples } from "./register-store";
import { createSourceFetcher } from "./search";

const log = childLogger("bootstrap");

export type Services = {
  store: RegisterStore;
  pipeline: Pipeline;
};

export async function initialize(config: AppConfig): Promise<Services> {
  const llm = createLlmClient({
    apiKey: config.model.apiKey,
    baseUrl: config.model.baseUrl,
    embeddingModel: config.model.embeddingModel,
    timeoutMs: config.model.timeoutMs,
  });

  const store = new RegisterStore(await ChromaBackend.connect(config.chroma, llm));
  await store.ensureSeeded(loadBuiltinExamples());

  const fetcher = createSourceFetcher({
    getHtml: createHtmlGetter({ userAgent: config.source.userAgent, timeoutMs: config.source.timeoutMs }),
    baseUrl: config.source.baseUrl,
    resultLimit: config.source.resultLimit,
    concurrency: config.source.concurrency,
    fieldCharCap: config.source.fieldCharCap,
  });

  const pipeline = createPipeline({
    fetcher,
    curator: createCurator(llm, config.model.curatorModel),
    explainer: createExplainer(llm, store, config.model.explainerModel),
  });

  log.info({ event: "bootstrap.ready" }, "Services ready");
  return { store, pipeline };
}
