import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["scripts/**/*.test.ts", "skills/**/*.test.ts"],
    environment: "node",
  },
});
