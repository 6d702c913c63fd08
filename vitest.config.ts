import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    testTimeout: 30_000,
    unstubEnvs: true,
    unstubGlobals: true,
    pool: "forks",
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
    exclude: ["dist/**", "**/node_modules/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      all: false,
      include: ["./src/**/*.ts"],
      exclude: ["test/**", "src/**/*.test.ts", "src/index.ts", "src/channels/discord/discord-adapter.ts"],
    },
  },
});
