import { defineProject } from "vitest/config";

export default defineProject({
  test: {
    name: "engine",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
