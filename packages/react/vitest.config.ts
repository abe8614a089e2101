import { defineConfig } from "vitest/config";
import path from "path";
import { fileURLToPath } from "url";

const here = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@embedkit/twitch-player-core": path.resolve(here, "../core/src/index.ts"),
    },
  },
  test: {
    name: "react",
    include: ["test/**/*.test.{ts,tsx}"],
    environment: "jsdom",
    globals: true,
    restoreMocks: true,
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      reportsDirectory: "./coverage",
      exclude: ["**/dist/**", "**/*.d.ts"],
    },
  },
});
