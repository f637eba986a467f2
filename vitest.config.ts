import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (pkg: string): string => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    // Workspace packages are tested from their sources, no build first
    alias: {
      "@cradlekit/shared": source("shared"),
      "@cradlekit/cradle": source("cradle"),
      "@cradlekit/module-cache": source("module-cache"),
      "@cradlekit/session": source("session"),
    },
  },
});
