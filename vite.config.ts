import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

// the service worker is built as its own entry at a fixed path so it can be registered as /sw.js
export default defineConfig({
  plugins: [react()],
  build: {
    rollupOptions: {
      input: {
        main: "index.html",
        sw: "src/serviceWorker.ts",
      },
      output: {
        entryFileNames: (chunk) => (chunk.name === "sw" ? "sw.js" : "assets/[name]-[hash].js"),
      },
    },
  },
});
