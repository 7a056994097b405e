import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    transformer: "src/transforms/macro-transformer.ts",
    cli: "src/cli/bin.ts",
  },
  format: ["esm"],
  dts: true,
  sourcemap: true,
  clean: true,
  splitting: false,
  outDir: "dist/bundle",
  external: ["typescript", "cosmiconfig"],
});
