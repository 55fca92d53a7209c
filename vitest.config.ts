import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["core/src/**/*.test.ts", "common/node/src/**/*.test.ts", "worker/node/src/**/*.test.ts"],
    environment: "node",
  },
});
