import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["validator/src/**/*.test.ts"],
		environment: "node",
	},
});
