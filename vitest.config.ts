import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    setupFiles: ["tests/setup.ts"],
    env: {
      LOG_TO_FILE: "false",
      LOG_LEVEL: "error",
    },
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "text-summary", "html"],
      reportsDirectory: "./coverage",
      exclude: [
        "node_modules/",
        "dist/",
        "coverage/",
        "**/*.d.ts",
        "**/*.config.ts",
        "**/types/**",
        "tests/**",
      ],
    },
    pool: "forks",
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
