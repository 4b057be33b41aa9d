// vitest.config.ts

import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  test: {
    environment: "node", // page tests opt into jsdom per file
    include: ["tests/**/*.test.{ts,tsx}"],
    exclude: ["node_modules", "dist", ".next"],
    env: {
      NEWS_API_KEY: "test-news-key",
      GROQ_API_KEY: "test-groq-key",
      NEWS_API_URL: "https://news.test/v2/everything",
      GROQ_BASE_URL: "https://llm.test/openai/v1",
      GROQ_MODEL: "test-model",
    },
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "./src"),
    },
  },
});
