import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@outcome-kit/type-system",
    environment: "node",
  },
});
