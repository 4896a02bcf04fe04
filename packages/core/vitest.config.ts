import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@alternate/core",
    globals: true,
    environment: "node",
  },
});
