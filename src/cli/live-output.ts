import cliTruncate from "cli-truncate";
import { createLogUpdate } from "log-update";

type LiveOutputOptions = {
	stdout?: NodeJS.WriteStream;
	maxWidth?: number;
};

export type LiveOutput = {
	render: (lines: string[]) => void;
	persist: (lines: string[]) => void;
	clear: () => void;
	stop: () => void;
};

/** A redrawable block of terminal lines, each cut to the terminal width. */
export const createLiveOutput = (
	options: LiveOutputOptions = {},
): LiveOutput => {
	const stdout = options.stdout ?? process.stdout;
	const updater = createLogUpdate(stdout);
	const maxWidth = options.maxWidth ?? Math.max(20, (stdout.columns ?? 80) - 2);
	const format = (lines: string[]) =>
		lines.map((line) => cliTruncate(line, maxWidth, { position: "end" })).join("\n");

	return {
		render: (lines) => updater(format(lines)),
		persist: (lines) => {
			updater(format(lines));
			updater.done();
		},
		clear: () => updater.clear(),
		stop: () => updater.done(),
	};
};

/** Collects persisted lines in memory. */
export const createBufferedOutput = (): LiveOutput & { lines: string[] } => {
	const lines: string[] = [];
	return {
		lines,
		render: () => {},
		persist: (next) => {
			lines.push(...next);
		},
		clear: () => {},
		stop: () => {},
	};
};
