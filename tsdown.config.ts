import { defineConfig } from "tsdown";

export default defineConfig({
  entry: {
    index: "apps/dashboard/src/index.ts",
  },
  format: "esm",
  platform: "node",
  target: "node20",
  outDir: "dist",
  clean: true,
  shims: false,
});
