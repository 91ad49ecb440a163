import "dotenv/config";
import { ConfigError, createHtmlGetter, initialize, loadConfig, logger } from "meme-research";
import { searchYoutubeVideos } from "../youtube";
import { createApp } from "./app";

async function main() {
  const config = loadConfig();
  const { pipeline } = await initialize(config);

  const getHtml = createHtmlGetter({ userAgent: config.source.userAgent, timeoutMs: config.source.timeoutMs });
  const app = createApp({
    pipeline,
    searchVideos: (topic, maxResults) => searchYoutubeVideos(getHtml, topic, maxResults),
  });

  const PORT = Number(process.env.PORT || 8000);
  app.listen(PORT, () => {
    logger.info({ event: "api.listen", port: PORT }, `[API] listening on http://localhost:${PORT}`);
  });
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.fatal({ event: "api.config.fail", keys: err.keys }, err.message);
  } else {
    logger.fatal({ event: "api.start.fail", error: err instanceof Error ? err.message : String(err) }, "Startup failed");
  }
  process.exit(1);
});
