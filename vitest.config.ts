import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  resolve: {
    alias: {
      "@shared/schema": fileURLToPath(new URL("./packages/shared/schema/index.ts", import.meta.url)),
      "@shared": fileURLToPath(new URL("./packages/shared", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["server/**/*.test.ts", "packages/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary", "lcov"],
      include: ["server/**/*.ts", "packages/shared/**/*.ts"],
      exclude: [
        "**/*.test.ts",
        "**/types.ts",
        // Entry point and schema-only files
        "server/index.ts",
        "packages/shared/schema/**",
      ],
    },
    testTimeout: 10000,
  },
});
