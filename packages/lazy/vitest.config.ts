import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@alternate/lazy",
    globals: true,
    environment: "node",
  },
});
