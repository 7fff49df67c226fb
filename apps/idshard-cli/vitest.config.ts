import { fileURLToPath } from "node:url";
import { defineProject } from "vitest/config";

export default defineProject({
  resolve: {
    // Tests run against the engine sources; the built CLI loads the engine's dist.
    alias: {
      "@idshard/engine": fileURLToPath(
        new URL("../../packages/shard-engine/src/index.ts", import.meta.url),
      ),
    },
  },
  test: {
    name: "cli",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
