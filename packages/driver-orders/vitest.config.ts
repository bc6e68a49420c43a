import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@courierflow/driver-orders",
    environment: "node",
    include: ["tests/unit/**/*.test.ts", "tests/steps/**/*.steps.ts"],
  },
});
