import type { Config } from "tailwindcss";

// Globs resolve from the repository root, where vite is started.
const config: Config = {
  content: ["./apps/ui/index.html", "./apps/ui/src/**/*.{ts,tsx}"],
  theme: {
    extend: {
      colors: {
        substrate: {
          50: "#f8f6f2",
          100: "#ede7dc",
          200: "#d9ccb6",
          300: "#c2ab8a",
          400: "#ac8d66",
          500: "#92734f",
          600: "#775c40",
          700: "#5e4834",
          800: "#43342a",
          900: "#2b221c"
        }
      },
      fontFamily: {
        mono: ["ui-monospace", "SFMono-Regular", "Menlo", "monospace"]
      }
    }
  },
  plugins: []
};

export default config;
