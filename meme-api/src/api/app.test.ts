import type { Server } from "node:http";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { ExplainedState, Pipeline } from "meme-research";
import type { VideoResult } from "../youtube";
import { SERVICE_NAME, createApp, type AppDeps } from "./app";

const explained: ExplainedState = {
  topic: "drake meme",
  register: "boomer",
  rawData: "raw",
  fetchStatus: "ok",
  sources: ["https://kym.test/memes/drakeposting"],
  curated: {
    name: "Drakeposting",
    about: "a",
    origin: "o",
    usage: "u",
    sources: ["https://kym.test/memes/drakeposting"],
  },
  explanation: "Drake declines one option.\n\n## Sources\n- https://kym.test/memes/drakeposting",
};

const video: VideoResult = {
  title: "Drake meme explained",
  url: "https://www.youtube.com/watch?v=abc",
  thumbnail: "",
  channel: "Meme Channel",
  type: "video",
  platform: "youtube",
  video_id: "abc",
};

let server: Server | undefined;

afterEach(async () => {
  const s = server;
  server = undefined;
  if (s) await new Promise<void>((resolve) => s.close(() => resolve()));
});

async function start(overrides: Partial<AppDeps> = {}) {
  const pipeline: Pipeline = { run: vi.fn(async () => explained) };
  const searchVideos = vi.fn(async () => [video]);
  const app = createApp({ pipeline, searchVideos, accessLog: null, ...overrides });
  const s = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  server = s;
  const address = s.address();
  if (address === null || typeof address === "string") throw new Error("server has no port");
  return { base: `http://127.0.0.1:${address.port}`, pipeline: overrides.pipeline ?? pipeline, searchVideos };
}

describe("service info", () => {
  it("reports status on / and /health", async () => {
    const { base } = await start();

    const root = await fetch(`${base}/`);
    expect(await root.json()).toEqual({ status: "active", service: SERVICE_NAME, version: "1.0.0" });

    const health = await fetch(`${base}/health`);
    expect(await health.json()).toMatchObject({ status: "healthy", pipeline: "ready" });
  });
});

describe("GET /explain/explanation", () => {
  it("runs the pipeline and returns the name and explanation", async () => {
    const { base, pipeline } = await start();

    const res = await fetch(`${base}/explain/explanation?topic=drake%20meme&register=boomer`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ meme_name: "Drakeposting", explanation: explained.explanation });
    expect(pipeline.run).toHaveBeenCalledWith({ topic: "drake meme", register: "boomer" });
  });

  it("accepts the sociolect alias", async () => {
    const { base, pipeline } = await start();
    const res = await fetch(`${base}/explain/explanation?topic=drake&sociolect=gen-x`);
    expect(res.status).toBe(200);
    expect(pipeline.run).toHaveBeenCalledWith({ topic: "drake", register: "gen-x" });
  });

  it("rejects an unknown register with 400", async () => {
    const { base, pipeline } = await start();

    const res = await fetch(`${base}/explain/explanation?topic=drake&register=gen-alpha`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      ok: false,
      error: { formErrors: [], fieldErrors: { register: [expect.any(String)] } },
    });
    expect(pipeline.run).not.toHaveBeenCalled();
  });

  it("rejects a missing topic with 400", async () => {
    const { base } = await start();
    const res = await fetch(`${base}/explain/explanation?register=gen-z`);
    expect(res.status).toBe(400);
  });

  it("turns pipeline errors into 500", async () => {
    const pipeline: Pipeline = {
      run: vi.fn(async () => {
        throw new Error("Model API error: 503");
      }),
    };
    const { base } = await start({ pipeline });

    const res = await fetch(`${base}/explain/explanation?topic=drake&register=gen-z`);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      ok: false,
      error: "Error processing meme explanation: Model API error: 503",
    });
  });
});

describe("media routes", () => {
  it("wraps videos with a count on /media/videos", async () => {
    const { base, searchVideos } = await start();

    const res = await fetch(`${base}/media/videos?topic=drake&max_results=2`);

    expect(await res.json()).toEqual({ meme_name: "drake", youtube_videos: [video], total_results: 1 });
    expect(searchVideos).toHaveBeenCalledWith("drake", 2);
  });

  it("returns the bare list on /media/youtube with three results by default", async () => {
    const { base, searchVideos } = await start();

    const res = await fetch(`${base}/media/youtube?topic=drake`);

    expect(await res.json()).toEqual([video]);
    expect(searchVideos).toHaveBeenCalledWith("drake", 3);
  });

  it("rejects out-of-range max_results", async () => {
    const { base } = await start();
    const res = await fetch(`${base}/media/videos?topic=drake&max_results=50`);
    expect(res.status).toBe(400);
  });
});

describe("unknown routes", () => {
  it("answers 404 with a JSON body", async () => {
    const { base } = await start();
    const res = await fetch(`${base}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ ok: false, error: "Not found" });
  });
});
