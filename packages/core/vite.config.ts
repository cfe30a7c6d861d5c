import { fileURLToPath } from "node:url";
import { defineConfig } from "vite";
import dts from "vite-plugin-dts";

const packageDir = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  plugins: [
    dts(), // generate .d.ts files
  ],
  build: {
    lib: {
      name: "wgsl-stitch-core",
      entry: [packageDir + "src/index.ts"],
      formats: ["es"],
    },
    rollupOptions: {
      external: ["mini-parse"],
    },
    minify: false,
    sourcemap: true,
  },
});
