import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["shared-utils/tests/**/*.test.ts", "work-orders/tests/**/*.test.ts"],
    environment: "node",
  },
});
