import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["sdk/packages/*/src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["sdk/packages/*/src/**/*.ts"],
      exclude: ["sdk/packages/*/src/**/*.test.ts", "sdk/packages/*/src/index.ts"],
      reporter: ["text", "html", "json"],
      reportsDirectory: "./coverage",
    },
  },
  resolve: {
    alias: {
      "@roomgrant/core": fileURLToPath(
        new URL("./sdk/packages/core/src/index.ts", import.meta.url),
      ),
    },
  },
});
