const resolveGitCommand = (): string => {
	// Tests and packaged installs may point at a specific git binary
	const override = process.env.FLEET_GIT_COMMAND;
	if (override) {
		return override;
	}
	return "git";
};

const buildGitEnv = (): NodeJS.ProcessEnv => {
	const pathValue = process.env.PATH ?? process.env.Path;
	return {
		...process.env,
		...(pathValue ? { PATH: pathValue } : {}),
		GIT_TERMINAL_PROMPT: "0",
		GIT_CONFIG_NOSYSTEM: "1",
		GIT_MERGE_AUTOEDIT: "no",
		GIT_EDITOR: "true",
		LC_ALL: "C",
		...(process.platform === "win32" ? {} : { GIT_ASKPASS: "/bin/false" }),
	};
};

export { buildGitEnv, resolveGitCommand };
