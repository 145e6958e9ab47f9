import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "fence-render",
    globals: false,
    environment: "node",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
