import { defineConfig } from "vite";

const apiPort = process.env.LINGODESK_PORT || "5280";

export default defineConfig({
  server: {
    port: 5178,
    proxy: {
      "/api": `http://localhost:${apiPort}`,
    },
  },
  build: {
    outDir: "dist",
    emptyOutDir: true,
  },
});
