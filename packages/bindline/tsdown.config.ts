import { defineConfig } from "tsdown";

export default defineConfig({
    entry: {
        index: "src/index.ts",
    },
    format: ["esm"],
    platform: "node",
    target: "node20",
    dts: true,
    outDir: "dist",
    treeshake: true,
});
