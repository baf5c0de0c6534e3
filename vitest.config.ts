import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		// better-sqlite3 is a native module
		pool: "forks",
		include: ["test/**/*.test.ts"],
		globals: false,
	},
});
