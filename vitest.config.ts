import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    // keep pino quiet while the suites run
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },
  },
});
