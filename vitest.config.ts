import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspace = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@scardlens/contracts": workspace("./packages/contracts/src/index.ts"),
      "@scardlens/core": workspace("./packages/core/src/index.ts"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
  },
});
