import { defineConfig } from "vitest/config";
import path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  root: __dirname,
  test: {
    globals: true,
    environment: "node",
    include: [
      "shared/src/**/*.test.ts",
      "sessions/src/**/*.test.ts",
      "process/src/**/*.test.ts",
      "system/src/**/*.test.ts",
      "server/src/**/*.test.ts",
      "client/src/**/*.test.ts",
    ],
    // Executor tests spawn real child processes
    testTimeout: 15_000,
  },
});
