import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["**/tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
  resolve: {
    alias: {
      "@pixvault/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
      "@pixvault/store-mem": fileURLToPath(
        new URL("./packages/store-mem/src/index.ts", import.meta.url),
      ),
      "@pixvault/store-sql": fileURLToPath(
        new URL("./packages/store-sql/src/index.ts", import.meta.url),
      ),
    },
  },
});
