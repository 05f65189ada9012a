import { defineConfig } from "tsup";

export default defineConfig({
    entry: ["src/index.ts", "src/install.ts", "src/events.ts", "src/metrics.ts", "src/logger.ts", "src/provider.ts", "src/attributes.ts"],
    format: ["esm"],
    dts: true,
    sourcemap: true,
    clean: true,
    minify: false,
    splitting: false,
});
