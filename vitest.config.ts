import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["meme-research/src/**/*.test.ts", "meme-api/src/**/*.test.ts"],
    environment: "node",
  },
});
