import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@faultline/core",
    globals: true,
    environment: "node",
  },
});
