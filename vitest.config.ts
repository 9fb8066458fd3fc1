import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["stages/**/*.test.ts", "config/**/*.test.ts"],
    environment: "node",
  },
});
