import { createServer, type IncomingMessage, type Server } from "node:http";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { ModelRequestError } from "./errors";
import { createLlmClient } from "./llm";

type Recorded = { path: string; auth: string | undefined; body: unknown };

let server: Server;
let baseUrl: string;
let recorded: Recorded[] = [];
let reply: { status: number; body: unknown } = { status: 200, body: {} };

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    req.on("data", (chunk: Buffer) => (data += chunk.toString()));
    req.on("end", () => resolve(data));
    req.on("error", reject);
  });
}

beforeAll(async () => {
  server = createServer((req, res) => {
    readBody(req)
      .then((raw) => {
        recorded.push({ path: req.url ?? "", auth: req.headers.authorization, body: JSON.parse(raw) });
        res.writeHead(reply.status, { "Content-Type": "application/json" });
        res.end(JSON.stringify(reply.body));
      })
      .catch((err: unknown) => {
        res.writeHead(500);
        res.end(String(err));
      });
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server has no port");
  baseUrl = `http://127.0.0.1:${address.port}/v1`;
});

afterAll(async () => {
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

beforeEach(() => {
  recorded = [];
  reply = { status: 200, body: {} };
});

describe("createLlmClient.complete", () => {
  it("posts a system and user message and returns the content", async () => {
    reply = { status: 200, body: { choices: [{ message: { content: "hello" } }], usage: { total_tokens: 12 } } };
    const llm = createLlmClient({ apiKey: "test-key", baseUrl, model: "default-model" });

    const content = await llm.complete({ system: "sys", user: "usr", temperature: 0.3 });

    expect(content).toBe("hello");
    expect(recorded).toEqual([
      {
        path: "/v1/chat/completions",
        auth: "Bearer test-key",
        body: {
          model: "default-model",
          messages: [
            { role: "system", content: "sys" },
            { role: "user", content: "usr" },
          ],
          temperature: 0.3,
        },
      },
    ]);
  });

  it("uses a per-request model override", async () => {
    reply = { status: 200, body: { choices: [{ message: { content: null } }] } };
    const llm = createLlmClient({ apiKey: "test-key", baseUrl });

    await expect(llm.complete({ system: "s", user: "u", temperature: 0.7, model: "other" })).resolves.toBe("");
    expect(recorded[0].body).toMatchObject({ model: "other", temperature: 0.7 });
  });

  it("wraps error statuses", async () => {
    reply = { status: 401, body: { error: { message: "bad key" } } };
    const llm = createLlmClient({ apiKey: "test-key", baseUrl });

    const err = await llm.complete({ system: "s", user: "u", temperature: 0 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ModelRequestError);
    if (err instanceof ModelRequestError) expect(err.status).toBe(401);
  });

  it("rejects a payload without choices", async () => {
    reply = { status: 200, body: { choices: [] } };
    const llm = createLlmClient({ apiKey: "test-key", baseUrl });
    await expect(llm.complete({ system: "s", user: "u", temperature: 0 })).rejects.toThrow(
      "Model API returned an unexpected completion payload",
    );
  });
});

describe("createLlmClient.embed", () => {
  it("returns vectors in input order", async () => {
    reply = {
      status: 200,
      body: {
        data: [
          { index: 1, embedding: [0.2] },
          { index: 0, embedding: [0.1] },
        ],
      },
    };
    const llm = createLlmClient({ apiKey: "test-key", baseUrl, embeddingModel: "embed-model" });

    await expect(llm.embed(["a", "b"])).resolves.toEqual([[0.1], [0.2]]);
    expect(recorded[0]).toMatchObject({ path: "/v1/embeddings", body: { model: "embed-model", input: ["a", "b"] } });
  });

  it("skips the request for no input", async () => {
    const llm = createLlmClient({ apiKey: "test-key", baseUrl });
    await expect(llm.embed([])).resolves.toEqual([]);
    expect(recorded).toEqual([]);
  });
});
