import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["compiler/tests/**/*.test.ts"],
  },
});
