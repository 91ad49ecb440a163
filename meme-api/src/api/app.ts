import express, { type Express } from "express";
import cors from "cors";
import morgan from "morgan";
import { z } from "zod";
import { RegisterSchema, childLogger, type Pipeline } from "meme-research";
import type { VideoResult } from "../youtube";

const log = childLogger("api");

export const SERVICE_NAME = "Meme Explanation API";
export const SERVICE_VERSION = "1.0.0";

export type AppDeps = {
  pipeline: Pipeline;
  searchVideos: (topic: string, maxResults: number) => Promise<VideoResult[]>;
  /** morgan format; pass null to disable access logs. */
  accessLog?: string | null;
};

const ExplainQuerySchema = z.object({
  topic: z.string().trim().min(1, "topic is required"),
  register: RegisterSchema,
});

const MediaQuerySchema = z.object({
  topic: z.string().trim().min(1, "topic is required"),
  max_results: z.coerce.number().int().min(1).max(10).default(3),
});

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createApp({ pipeline, searchVideos, accessLog = "dev" }: AppDeps): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  if (accessLog) app.use(morgan(accessLog));

  app.get("/", (_req, res) => {
    res.json({ status: "active", service: SERVICE_NAME, version: SERVICE_VERSION });
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      pipeline: "ready",
      endpoints: {
        explain: "/explain/explanation?topic={topic}&register={register}",
        videos: "/media/videos?topic={topic}",
        youtube: "/media/youtube?topic={topic}",
      },
    });
  });

  // `sociolect` is the older name of the register parameter.
  app.get("/explain/explanation", async (req, res) => {
    const parsed = ExplainQuerySchema.safeParse({
      topic: req.query.topic,
      register: req.query.register ?? req.query.sociolect,
    });
    if (!parsed.success) {
      return res.status(400).json({ ok: false, error: parsed.error.flatten() });
    }

    try {
      const state = await pipeline.run(parsed.data);
      return res.json({ meme_name: state.curated.name, explanation: state.explanation });
    } catch (err: unknown) {
      log.error({ event: "api.explain.fail", ...parsed.data, error: message(err) }, "Pipeline failed");
      return res.status(500).json({ ok: false, error: `Error processing meme explanation: ${message(err)}` });
    }
  });

  app.get("/media/videos", async (req, res) => {
    const parsed = MediaQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ ok: false, error: parsed.error.flatten() });
    }

    try {
      const videos = await searchVideos(parsed.data.topic, parsed.data.max_results);
      return res.json({ meme_name: parsed.data.topic, youtube_videos: videos, total_results: videos.length });
    } catch (err: unknown) {
      return res.status(500).json({ ok: false, error: `Error fetching videos: ${message(err)}` });
    }
  });

  app.get("/media/youtube", async (req, res) => {
    const parsed = MediaQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ ok: false, error: parsed.error.flatten() });
    }

    try {
      return res.json(await searchVideos(parsed.data.topic, parsed.data.max_results));
    } catch (err: unknown) {
      return res.status(500).json({ ok: false, error: `Error fetching YouTube videos: ${message(err)}` });
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "Not found" });
  });

  return app;
}
