import { defineConfig } from "vitest/config";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const rootDir = dirname(fileURLToPath(import.meta.url));
const projectRoot = resolve(rootDir, "..");

export default defineConfig({
  root: projectRoot,
  test: {
    include: [
      "supplier_capabilities/tests/**/*.test.ts",
      "apps/*/src/**/*.test.ts",
      "packages/*/src/**/*.test.ts"
    ],
    environment: "node",
    globals: true
  }
});
