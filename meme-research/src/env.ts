import * as dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors";
dotenv.config();

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const required = z.string().trim().min(1);

const EnvSchema = z.object({
  OPENAI_API_KEY: required,
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  CURATOR_MODEL: z.string().default("gpt-4o"),
  EXPLAINER_MODEL: z.string().default("gpt-4o"),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),

  CHROMA_API_KEY: required,
  CHROMA_TENANT: required,
  CHROMA_DATABASE: required,

  SOURCE_BASE_URL: z.string().url().default("https://knowyourmeme.com"),
  USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  FETCH_CONCURRENCY: z.coerce.number().int().positive().default(5),
  SEARCH_RESULT_LIMIT: z.coerce.number().int().positive().default(5),
  FIELD_CHAR_CAP: z.coerce.number().int().positive().default(800),
});

export type Env = z.infer<typeof EnvSchema>;

export type AppConfig = {
  model: {
    apiKey: string;
    baseUrl: string;
    curatorModel: string;
    explainerModel: string;
    embeddingModel: string;
    timeoutMs: number;
  };
  chroma: {
    apiKey: string;
    tenant: string;
    database: string;
  };
  source: {
    baseUrl: string;
    userAgent: string;
    timeoutMs: number;
    concurrency: number;
    resultLimit: number;
    fieldCharCap: number;
  };
};

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, v]) => v !== undefined && v.trim() !== ""),
  );
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((i) => String(i.path[0])))];
    throw new ConfigError(
      `Missing or invalid environment variables: ${keys.join(", ")}\n` +
        `Please check your .env file and ensure all required variables are set.`,
      keys,
    );
  }

  const env = parsed.data;
  return {
    model: {
      apiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
      curatorModel: env.CURATOR_MODEL,
      explainerModel: env.EXPLAINER_MODEL,
      embeddingModel: env.EMBEDDING_MODEL,
      timeoutMs: env.MODEL_TIMEOUT_MS,
    },
    chroma: {
      apiKey: env.CHROMA_API_KEY,
      tenant: env.CHROMA_TENANT,
      database: env.CHROMA_DATABASE,
    },
    source: {
      baseUrl: env.SOURCE_BASE_URL,
      userAgent: env.USER_AGENT,
      timeoutMs: env.HTTP_TIMEOUT_MS,
      concurrency: env.FETCH_CONCURRENCY,
      resultLimit: env.SEARCH_RESULT_LIMIT,
      fieldCharCap: env.FIELD_CHAR_CAP,
    },
  };
}
