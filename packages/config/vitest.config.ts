import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@nwa-stdlib/config",
    globals: true,
    environment: "node",
  },
});
