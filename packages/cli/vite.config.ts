import { fileURLToPath } from "node:url";
import { defineConfig } from "vite";

export default defineConfig({
  build: {
    lib: {
      entry: fileURLToPath(new URL("./src/main.ts", import.meta.url)),
      formats: ["es"],
      fileName: "main",
    },
    target: "node20",
    rollupOptions: {
      external: [/^node:/, "yargs", "yargs/helpers", "diff", "typescript", "mini-parse"],
    },
  },
});
