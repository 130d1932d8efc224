import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": process.cwd(),
    },
  },
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    env: {
      LOG_LEVEL: "error",
      VERSE_TIMEZONE: "UTC",
    },
    restoreMocks: true,
    clearMocks: true,
  },
});
