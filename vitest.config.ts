import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import { join } from "node:path";

const rootDir = fileURLToPath(new URL("./", import.meta.url));
const packagesDir = join(rootDir, "packages");

export default defineConfig({
  resolve: {
    alias: {
      "@monoweave/contracts": join(packagesDir, "contracts/src/index.ts"),
      "@monoweave/adapters": join(packagesDir, "adapters/src/index.ts"),
      "@monoweave/core": join(packagesDir, "core/src/index.ts"),
    },
  },
  test: {
    globals: false,
    environment: "node",
    include: ["packages/*/src/**/__tests__/**/*.spec.ts"],
    testTimeout: 20000,
    coverage: {
      reportsDirectory: "./coverage",
      exclude: [
        "**/node_modules/**",
        "**/dist/**",
        "**/__tests__/**",
        "**/*.d.ts",
        "**/types/**",
      ],
    },
  },
});
