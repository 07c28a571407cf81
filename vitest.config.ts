import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["test/unit/**/*.spec.ts"],
		env: {
			LOG_LEVEL: "silent",
		},
		testTimeout: 10000,
	},
});
