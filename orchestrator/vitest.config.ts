import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const resolveDir = (relative: string) =>
  fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    dir: resolveDir(".."),
    include: ["orchestrator/src/**/*.test.ts", "shared/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
  resolve: {
    alias: {
      "@server": resolveDir("./src/server"),
      "@infra": resolveDir("./src/server/infra"),
      "@shared": resolveDir("../shared/src"),
    },
  },
});
