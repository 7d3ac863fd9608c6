import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["workers/ts/test/**/*.test.ts"],
    environment: "node",
  },
});
