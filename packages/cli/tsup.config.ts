import { defineConfig } from "tsup"

export default defineConfig({
	entry: ["src/index.ts"],
	format: ["esm"],
	target: "node20",
	outDir: "dist",
	clean: true,
	splitting: false,
	sourcemap: false,
	dts: false,
	// Bundle @adjnorm/core into the output
	noExternal: [/@adjnorm\//],
	// Keep all npm dependencies external (installed by users)
	external: ["commander", "zod"],
	banner: {
		js: "#!/usr/bin/env node",
	},
})
