import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@relic-curator/schema": fileURLToPath(new URL("./packages/schema/src/index.ts", import.meta.url))
    }
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node"
  }
});
