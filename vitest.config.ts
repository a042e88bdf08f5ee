import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/mcp/src/**/*.test.ts", "apps/web/app/**/*.test.ts", "apps/web/*.test.ts"],
  },
  resolve: {
    alias: {
      "@match-predictor/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
    },
  },
});
