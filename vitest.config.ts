import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    setupFiles: ["tests/setup.ts"],
    restoreMocks: true,
    clearMocks: true,
    unstubGlobals: true,

    // Reduce console spam from libs during tests
    onConsoleLog(log: string) {
      if (/\[dotenv@/i.test(log) || /injecting env/i.test(log) || /tip:/i.test(log)) {
        return false;
      }
      return true;
    },

    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary", "html"],
      exclude: ["tests/**", "**/*.test.ts", "scripts/**", "dist/**", "vitest.config.ts"],
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 60,
        statements: 70,
      },
    },
  },
});
