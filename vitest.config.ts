// vitest.config.ts
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/tests/**/*.spec.ts", "apps/*/tests/**/*.spec.ts"],
    environment: "node",
    // keep console output of passing tests out of the report
    onConsoleLog() {
      return false;
    },
  },
});
