import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["*.test.ts"],
    env: {
      WEGCHAIN_LOG_LEVEL: "silent",
    },
  },
});
