import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["services/runner/tests/**/*.test.ts", "backend/tests/**/*.test.ts"],
    globals: true,
    setupFiles: ["backend/tests/setup.ts"]
  }
});
