import { ExecaError, execa } from "execa";

import { GitCommandError } from "../errors";
import { buildGitEnv, resolveGitCommand } from "./git-env";
import { redactCredentials } from "./redact";

export const DEFAULT_GIT_TIMEOUT_MS = 120000; // 2 minutes
const DEFAULT_PROGRESS_THROTTLE_MS = 120;
const MAX_BUFFER = 10 * 1024 * 1024;

export type GitLogger = (message: string) => void;

export type GitOptions = {
	cwd?: string;
	timeoutMs?: number;
	allowFileProtocol?: boolean;
	logger?: GitLogger;
	progressLogger?: GitLogger;
	progressThrottleMs?: number;
};

const buildGitConfigs = (allowFileProtocol?: boolean) => [
	"-c",
	"core.hooksPath=/dev/null",
	"-c",
	"submodule.recurse=false",
	"-c",
	"protocol.ext.allow=never",
	"-c",
	`protocol.file.allow=${allowFileProtocol ? "always" : "never"}`,
];

const isProgressLine = (line: string) =>
	line.includes("Receiving objects") ||
	line.includes("Resolving deltas") ||
	line.includes("Compressing objects") ||
	line.includes("Updating files") ||
	line.includes("Counting objects");

const shouldEmitProgress = (
	line: string,
	now: number,
	lastProgressAt: number,
	throttleMs: number,
) =>
	now - lastProgressAt >= throttleMs ||
	line.includes("100%") ||
	line.includes("done");

const forwardProgress = (
	stream: NodeJS.ReadableStream | null,
	progressLogger: GitLogger,
	throttleMs: number,
) => {
	if (!stream) return;
	let lastProgressAt = 0;
	stream.on("data", (chunk: unknown) => {
		const text =
			chunk instanceof Buffer ? chunk.toString("utf8") : String(chunk);
		for (const line of text.split(/\r|\n/)) {
			if (!line || !isProgressLine(line)) continue;
			const now = Date.now();
			if (shouldEmitProgress(line, now, lastProgressAt, throttleMs)) {
				lastProgressAt = now;
				progressLogger(line.trim());
			}
		}
	});
};

/**
 * Runs one git command and resolves with its stdout. Hooks, submodule
 * recursion and the `ext` transport are always disabled; local `file`
 * remotes only work when `allowFileProtocol` is set.
 */
export const runGit = async (
	args: string[],
	options: GitOptions = {},
): Promise<string> => {
	const commandArgs = [...buildGitConfigs(options.allowFileProtocol), ...args];
	if (options.progressLogger) {
		commandArgs.push("--progress");
	}
	options.logger?.(redactCredentials(`git ${args.join(" ")}`));
	const subprocess = execa(resolveGitCommand(), commandArgs, {
		cwd: options.cwd,
		timeout: options.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS,
		maxBuffer: MAX_BUFFER,
		stdin: "ignore",
		stdout: "pipe",
		stderr: "pipe",
		env: buildGitEnv(),
	});
	if (options.progressLogger) {
		forwardProgress(
			subprocess.stderr,
			options.progressLogger,
			options.progressThrottleMs ?? DEFAULT_PROGRESS_THROTTLE_MS,
		);
	}
	try {
		const result = await subprocess;
		return result.stdout;
	} catch (error) {
		if (error instanceof ExecaError) {
			const stderr =
				typeof error.stderr === "string" ? error.stderr.trim() : "";
			throw new GitCommandError(
				{
					args: args.map(redactCredentials),
					exitCode: error.exitCode,
					stderr: redactCredentials(stderr || error.shortMessage),
					timedOut: error.timedOut,
				},
				{ cause: error },
			);
		}
		throw error;
	}
};
