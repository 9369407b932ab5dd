import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  // Package tests
  "packages/*/vitest.config.ts",
]);
