import { defineConfig } from "tsdown"

export default defineConfig({
  entry: ["src/main.ts"],

  format: ["esm"],
  target: "node20",
  platform: "node",
  fixedExtension: true,

  // The bundle is the artifact `remote upload` copies to the target host,
  // so it has to run without a node_modules next to it.
  noExternal: [/.*/],

  sourcemap: false,
  clean: true,

  env: {
    NODE_ENV: "production",
  },
})
