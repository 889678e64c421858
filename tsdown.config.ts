import { defineConfig } from "tsdown";

export default defineConfig({
  entry: {
    index: "./src/index.ts",
    "bin/energy-graph": "./src/bin/energy-graph.ts",
  },
  format: "esm",
  target: "node20",
  clean: true,
  dts: true,
  sourcemap: true,
  platform: "node",
  external: ["d3", "open", "picocolors", "table", "yargs", "yargs/helpers"],
  logLevel: "warn",
});
