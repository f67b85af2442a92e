import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["tests/**/*.test.ts"],
		environment: "node",
		// Integration tests drive real git processes against local bare remotes.
		testTimeout: 30_000,
		hookTimeout: 30_000,
		env: {
			GIT_CONFIG_GLOBAL: "/dev/null",
			GIT_AUTHOR_NAME: "Fleet Test",
			GIT_AUTHOR_EMAIL: "fleet@example.test",
			GIT_COMMITTER_NAME: "Fleet Test",
			GIT_COMMITTER_EMAIL: "fleet@example.test",
		},
	},
});
