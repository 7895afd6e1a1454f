import { defineConfig } from "vitest/config";
import path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Tests run against core's sources; its package exports point at dist
      "@faultline/core": path.resolve(__dirname, "../core/src/index.ts"),
    },
  },
  test: {
    name: "@faultline/codegen",
    globals: true,
    environment: "node",
  },
});
