import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@outcome-kit/fp",
    environment: "node",
  },
});
