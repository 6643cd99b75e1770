import type { Config } from "tailwindcss";

const config: Config = {
  content: [
    "./app/**/*.{js,ts,jsx,tsx,mdx}",
    "./components/**/*.{js,ts,jsx,tsx,mdx}",
  ],
  theme: {
    extend: {
      colors: {
        background: {
          DEFAULT: "#0f0d0b",
          secondary: "#171411",
          tertiary: "#211c18",
          hover: "#2b2520",
        },
        text: {
          primary: "#faf7f2",
          secondary: "#b8aea3",
          tertiary: "#8c8279",
          muted: "#6b625a",
        },
        border: {
          DEFAULT: "#2e2722",
          secondary: "#3d342d",
          hover: "#54483f",
        },
        // Espresso accent
        primary: {
          DEFAULT: "#c8814a",
          hover: "#b5703c",
          active: "#9c5f31",
        },
        success: {
          DEFAULT: "#22c55e",
          light: "#4ade80",
          dark: "#16a34a",
        },
        warning: {
          DEFAULT: "#f59e0b",
          light: "#fbbf24",
        },
        error: {
          DEFAULT: "#ef4444",
          light: "#f87171",
          dark: "#dc2626",
        },
        info: {
          DEFAULT: "#06b6d4",
          light: "#22d3ee",
        },
      },
      fontFamily: {
        sans: ["Inter", "system-ui", "sans-serif"],
      },
      keyframes: {
        "fade-in": {
          from: { opacity: "0" },
          to: { opacity: "1" },
        },
        "scale-in": {
          from: { opacity: "0", transform: "scale(0.96)" },
          to: { opacity: "1", transform: "scale(1)" },
        },
      },
      animation: {
        "fade-in": "fade-in 150ms ease-out",
        "scale-in": "scale-in 150ms ease-out",
      },
    },
  },
  plugins: [],
};

export default config;
