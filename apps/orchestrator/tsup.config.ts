import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  outDir: "dist",
  target: "node20",
  sourcemap: true,
  clean: true,
  splitting: false,
  noExternal: ["@relaycam/shared"]
});
