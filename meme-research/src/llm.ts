import axios from "axios";
import { z } from "zod";
import { ModelRequestError } from "./errors";
import { childLogger } from "./logger";

const log = childLogger("llm");

export type CompletionRequest = {
  system: string;
  user: string;
  temperature: number;
  model?: string;
  maxTokens?: number;
};

export interface LlmClient {
  complete(request: CompletionRequest): Promise<string>;
  embed(texts: string[]): Promise<number[][]>;
}

export type LlmClientConfig = {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  embeddingModel?: string;
  timeoutMs?: number;
};

const CompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
  usage: z.object({ total_tokens: z.number() }).optional(),
});

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ index: z.number(), embedding: z.array(z.number()) })),
});

export function createLlmClient({
  apiKey,
  baseUrl = "https://api.openai.com/v1",
  model = "gpt-4o",
  embeddingModel = "text-embedding-3-small",
  timeoutMs = 60_000,
}: LlmClientConfig): LlmClient {
  const http = axios.create({
    baseURL: baseUrl,
    timeout: timeoutMs,
    headers: {
      Authorization: `Bearer ${apiKey}`,
      "Content-Type": "application/json",
    },
  });

  async function post(path: string, body: unknown): Promise<unknown> {
    const startTime = Date.now();
    try {
      const res = await http.post<unknown>(path, body);
      log.debug({ event: "llm.request.success", path, durationMs: Date.now() - startTime }, "Model request succeeded");
      return res.data;
    } catch (err: unknown) {
      const status = axios.isAxiosError(err) ? err.response?.status : undefined;
      const message = err instanceof Error ? err.message : String(err);
      log.error(
        { event: "llm.request.fail", path, status, durationMs: Date.now() - startTime, error: message },
        "Model request failed",
      );
      throw new ModelRequestError(
        status ? `Model API error: ${status} ${message}` : `Model API request failed: ${message}`,
        status,
      );
    }
  }

  return {
    async complete({ system, user, temperature, model: override, maxTokens }) {
      const data = await post("/chat/completions", {
        model: override ?? model,
        messages: [
          { role: "system", content: system },
          { role: "user", content: user },
        ],
        temperature,
        ...(maxTokens ? { max_tokens: maxTokens } : {}),
      });

      const parsed = CompletionResponseSchema.safeParse(data);
      if (!parsed.success) {
        throw new ModelRequestError("Model API returned an unexpected completion payload");
      }
      log.info(
        { event: "llm.completion", model: override ?? model, tokens: parsed.data.usage?.total_tokens },
        "Completion received",
      );
      return parsed.data.choices[0].message.content ?? "";
    },

    async embed(texts) {
      if (texts.length === 0) return [];
      const data = await post("/embeddings", { model: embeddingModel, input: texts });
      const parsed = EmbeddingResponseSchema.safeParse(data);
      if (!parsed.success) {
        throw new ModelRequestError("Model API returned an unexpected embeddings payload");
      }
      return [...parsed.data.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    },
  };
}
