import { fileURLToPath } from "node:url";

import react from "@vitejs/plugin-react";
import tailwindcss from "tailwindcss";
import { defineConfig } from "vite";

import tailwindConfig from "./apps/ui/tailwind.config";

const sdkEntry = fileURLToPath(new URL("./packages/sdk/src/index.ts", import.meta.url));

export default defineConfig({
  root: fileURLToPath(new URL("./apps/ui", import.meta.url)),
  plugins: [react()],
  resolve: {
    alias: {
      "@shroombox/sdk": sdkEntry,
    },
  },
  css: {
    postcss: {
      plugins: [tailwindcss(tailwindConfig)],
    },
  },
  server: {
    host: "127.0.0.1",
    port: 5173,
    proxy: {
      "/api": {
        target: "http://127.0.0.1:5000",
        changeOrigin: true,
      },
    },
  },
  preview: {
    host: "127.0.0.1",
    port: 4173,
  },
  build: {
    outDir: fileURLToPath(new URL("./dist", import.meta.url)),
    emptyOutDir: true,
    rollupOptions: {
      output: {
        manualChunks(id) {
          if (id.includes("node_modules")) {
            if (id.includes("@heroicons")) {
              return "ui-toolkit";
            }
            return "vendor";
          }
        },
      },
    },
  },
});
