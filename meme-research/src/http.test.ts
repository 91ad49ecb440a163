import { createServer, type Server } from "node:http";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { createHtmlGetter } from "./http";

let server: Server;
let base: string;
let statuses: number[] = [];
let hits: { url: string; userAgent: string | undefined }[] = [];

beforeAll(async () => {
  server = createServer((req, res) => {
    hits.push({ url: req.url ?? "", userAgent: req.headers["user-agent"] });
    const status = statuses.shift() ?? 200;
    res.writeHead(status, { "Content-Type": "text/html" });
    res.end(status === 200 ? "<p>ok</p>" : "error");
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server has no port");
  base = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

beforeEach(() => {
  statuses = [];
  hits = [];
});

describe("createHtmlGetter", () => {
  it("sends the user agent and query params", async () => {
    const getHtml = createHtmlGetter({ userAgent: "meme-test/1.0" });

    await expect(getHtml(`${base}/search`, { q: "drake meme" })).resolves.toBe("<p>ok</p>");
    expect(hits).toEqual([{ url: "/search?q=drake+meme", userAgent: "meme-test/1.0" }]);
  });

  it("retries a 5xx answer once", async () => {
    statuses = [503];
    const getHtml = createHtmlGetter();

    await expect(getHtml(`${base}/memes/a`)).resolves.toBe("<p>ok</p>");
    expect(hits).toHaveLength(2);
  });

  it("does not retry a 4xx answer", async () => {
    statuses = [404];
    const getHtml = createHtmlGetter();

    await expect(getHtml(`${base}/memes/missing`)).rejects.toThrow("Request failed with status code 404");
    expect(hits).toHaveLength(1);
  });

  it("gives up after the last attempt", async () => {
    statuses = [500, 502];
    const getHtml = createHtmlGetter({ maxAttempts: 2 });

    await expect(getHtml(`${base}/memes/a`)).rejects.toThrow("Request failed with status code 502");
    expect(hits).toHaveLength(2);
  });
});
