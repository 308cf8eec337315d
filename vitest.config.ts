import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["lib/**/*.test.ts", "app/**/*.test.ts"],
    testTimeout: 15_000,
    env: {
      NODE_ENV: "test",
    },
  },
  resolve: {
    alias: {
      "@": dirname,
    },
  },
});
