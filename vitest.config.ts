import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  resolve: {
    alias: {
      "@meplatform/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
    },
  },
  test: {
    globals: false,
    include: ["packages/*/test/**/*.test.ts", "apps/*/test/**/*.test.ts"],
    // Tests share process.env for JWT settings and each opens its own SQLite file.
    fileParallelism: false,
  },
});
