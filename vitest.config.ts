import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["server/test/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      BODY_LIMIT: "64kb",
    },
  },
});
