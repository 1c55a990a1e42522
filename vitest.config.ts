import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspace = (relativePath: string): string =>
  fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@arena/shared-protocol": workspace("./packages/shared-protocol/src/index.ts"),
      "@arena/shared-sim": workspace("./packages/shared-sim/src/index.ts"),
      "@arena/shared-servers": workspace("./packages/shared-servers/src/index.ts"),
    },
  },
  test: {
    include: ["apps/server/test/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },
  },
});
