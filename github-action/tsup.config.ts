import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "github-action/index.ts",
  },
  format: ["esm"],
  platform: "node",
  target: "node20",
  outDir: "github-action/dist",
  // the runner has no node_modules, ship commander/js-yaml/@actions inside
  noExternal: [/.*/],
  // @actions/core is CommonJS and calls require() for node builtins
  banner: {
    js: 'import { createRequire } from "node:module"; const require = createRequire(import.meta.url);',
  },
  dts: false,
  sourcemap: true,
  splitting: false,
  clean: true,
});
