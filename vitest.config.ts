import { fileURLToPath } from "node:url";

import react from "@vitejs/plugin-react";
import { defineConfig } from "vitest/config";

export default defineConfig({
  plugins: [react()],
  resolve: {
    alias: {
      "@shroombox/sdk": fileURLToPath(new URL("./packages/sdk/src/index.ts", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "jsdom",
    environmentMatchGlobs: [["packages/sdk/**", "node"]],
    setupFiles: ["./apps/ui/vitest.setup.ts"],
    include: ["apps/ui/src/**/*.test.{ts,tsx}", "packages/sdk/test/**/*.test.ts"],
  },
});
