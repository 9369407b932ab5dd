import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@strand/parser",
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
