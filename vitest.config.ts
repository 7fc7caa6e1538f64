import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: ["packages/*"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      reportsDirectory: "./coverage",
      include: ["packages/*/src/**/*.ts"],
      // @gatehouse/types emits no runtime code
      exclude: ["**/*.d.ts", "packages/types/src/**"],
      thresholds: process.env.CI
        ? {
            functions: 80,
            branches: 80,
            lines: 80,
            statements: 80,
          }
        : undefined,
    },
  },
});
