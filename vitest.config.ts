import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["calcline-main/tests/**/*.test.ts", "calcline-cli/tests/**/*.test.ts"],
    environment: "node",
  },
});
