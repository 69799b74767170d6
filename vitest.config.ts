import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**"],
    testTimeout: 20000,
    coverage: {
      provider: "v8",
      reportsDirectory: "./coverage",
      reporter: ["text", "html", "lcov"],
      include: ["src/**/*.ts"],
      exclude: [
        // Test files
        "src/**/*.test.ts",
        // CLI commands (interactive, hard to test)
        "src/cli/**",
        // Re-export index files
        "src/**/index.ts",
        // Pure I/O wrappers (testing would just test Node.js/packages)
        "src/config/configManager.ts",
      ],
    },
  },
});
