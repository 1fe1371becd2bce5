import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@dir-summary/core-domain": fileURLToPath(
        new URL("./packages/core-domain/src/index.ts", import.meta.url)
      ),
    },
  },
  test: {
    environment: "node",
    include: ["packages/**/src/**/*.{test,spec}.ts"],
    exclude: ["**/dist/**", "**/node_modules/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      reportsDirectory: "coverage",
    },
  },
});
