import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["satchel/test/**/*.test.ts"],
    environment: "node",
  },
});
