export * from "./types";
export { loadConfig, type AppConfig } from "./env";
export { ConfigError, InvalidInputError, ModelRequestError } from "./errors";
export { logger, childLogger } from "./logger";
export { createHtmlGetter, type HtmlGetter } from "./http";
export { createSourceFetcher, type SourceFetcher } from "./search";
export { createLlmClient, type LlmClient } from "./llm";
export { createCurator, type Curator } from "./curator";
export { createExplainer, auditVocabulary, type Explainer } from "./explainer";
export { RegisterStore, loadBuiltinExamples, NO_PATTERNS } from "./register-store";
export { createPipeline, parsePipelineInput, type Pipeline, type StageObserver } from "./pipeline";
export { initialize, type Services } from "./bootstrap";
