import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@courierflow/fsm",
    environment: "node",
    include: ["tests/unit/**/*.test.ts"],
  },
});
