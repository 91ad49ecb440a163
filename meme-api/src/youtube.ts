/**
 * Video search for meme explainers. Reads the results page and pulls the
 * embedded `ytInitialData` JSON; no API key involved.
 */

import { childLogger, type HtmlGetter } from "meme-research";
import { z } from "zod";

const log = childLogger("youtube");

export const YOUTUBE_RESULTS_URL = "https://www.youtube.com/results";

export type VideoResult = {
  title: string;
  url: string;
  thumbnail: string;
  channel: string;
  type: "video" | "shorts";
  platform: "youtube";
  video_id: string;
};

const RunsSchema = z
  .object({ runs: z.array(z.object({ text: z.string().optional() })).optional() })
  .optional();

const VideoRendererSchema = z.object({
  videoId: z.string().optional(),
  title: RunsSchema,
  ownerText: RunsSchema,
  thumbnail: z.object({ thumbnails: z.array(z.object({ url: z.string() })).optional() }).optional(),
  navigationEndpoint: z
    .object({
      commandMetadata: z
        .object({ webCommandMetadata: z.object({ url: z.string().optional() }).optional() })
        .optional(),
    })
    .optional(),
});

type VideoRenderer = z.infer<typeof VideoRendererSchema>;

const InitialDataSchema = z.object({
  contents: z.object({
    twoColumnSearchResultsRenderer: z.object({
      primaryContents: z.object({
        sectionListRenderer: z.object({
          contents: z.array(
            z.object({
              itemSectionRenderer: z
                .object({
                  contents: z
                    .array(z.object({ videoRenderer: VideoRendererSchema.optional().catch(undefined) }))
                    .optional(),
                })
                .optional(),
            }),
          ),
        }),
      }),
    }),
  }),
});

export function extractInitialData(html: string): unknown {
  const match = html.match(/var ytInitialData = (\{.*?\});\s*<\/script>/s);
  if (!match) return null;
  try {
    return JSON.parse(match[1]);
  } catch {
    return null;
  }
}

function toVideoResult(renderer: VideoRenderer): VideoResult | null {
  const videoId = renderer.videoId;
  if (!videoId) return null;

  const path = renderer.navigationEndpoint?.commandMetadata?.webCommandMetadata?.url ?? "";
  const isShort = path.includes("shorts");
  const thumbnails = renderer.thumbnail?.thumbnails ?? [];

  return {
    title: renderer.title?.runs?.[0]?.text ?? "Unknown Title",
    url: isShort ? `https://www.youtube.com/shorts/${videoId}` : `https://www.youtube.com/watch?v=${videoId}`,
    thumbnail: thumbnails.length > 0 ? thumbnails[thumbnails.length - 1].url : "",
    channel: renderer.ownerText?.runs?.[0]?.text ?? "Unknown Channel",
    type: isShort ? "shorts" : "video",
    platform: "youtube",
    video_id: videoId,
  };
}

export function parseVideoResults(html: string, maxResults: number): VideoResult[] {
  const parsed = InitialDataSchema.safeParse(extractInitialData(html));
  if (!parsed.success) {
    log.warn({ event: "youtube.parse.fail" }, "Could not find ytInitialData in YouTube response");
    return [];
  }

  const results: VideoResult[] = [];
  const sections = parsed.data.contents.twoColumnSearchResultsRenderer.primaryContents.sectionListRenderer.contents;
  for (const section of sections) {
    for (const item of section.itemSectionRenderer?.contents ?? []) {
      if (results.length >= maxResults) return results;
      const video = item.videoRenderer ? toVideoResult(item.videoRenderer) : null;
      if (video) results.push(video);
    }
  }
  return results;
}

export async function searchYoutubeVideos(getHtml: HtmlGetter, topic: string, maxResults = 3): Promise<VideoResult[]> {
  try {
    const html = await getHtml(YOUTUBE_RESULTS_URL, { search_query: `${topic} meme explained` });
    return parseVideoResults(html, maxResults);
  } catch (err: unknown) {
    log.error(
      { event: "youtube.search.fail", topic, error: err instanceof Error ? err.message : String(err) },
      "Error searching YouTube",
    );
    return [];
  }
}
