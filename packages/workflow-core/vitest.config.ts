import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@courierflow/core",
    environment: "node",
    include: ["tests/unit/**/*.test.ts"],
  },
});
