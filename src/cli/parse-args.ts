import process from "node:process";

import cac from "cac";
import { UsageError } from "../errors";
import type { InstallMode } from "../types/fleet";
import type { CliCommand, CliOptions, CommandName } from "./types";

export const CLI_NAME = "fleet";

const COMMANDS = [
	"install",
	"update",
	"status",
	"lock",
	"unlock",
	"rollback",
	"set-version",
	"backups",
] as const satisfies readonly CommandName[];

const INSTALL_MODES: readonly InstallMode[] = ["dev", "prod"];

export type ParsedArgs = {
	command: CommandName | null;
	options: CliOptions;
	positionals: string[];
	help: boolean;
	parsed: CliCommand;
};

const isCommand = (value: string | undefined): value is CommandName =>
	COMMANDS.some((command) => command === value);

const isInstallMode = (value: string): value is InstallMode =>
	INSTALL_MODES.some((mode) => mode === value);

const optionalString = (value: unknown, flag: string) => {
	if (value === undefined) return undefined;
	if (typeof value !== "string" && typeof value !== "number") {
		throw new UsageError(`${flag} expects a value.`);
	}
	const text = String(value);
	if (!text) {
		throw new UsageError(`${flag} expects a value.`);
	}
	return text;
};

const positiveNumber = (value: unknown, flag: string) => {
	const text = optionalString(value, flag);
	if (text === undefined) return undefined;
	const parsed = Number(text);
	if (!Number.isFinite(parsed) || parsed < 1) {
		throw new UsageError(`${flag} must be a positive number.`);
	}
	return parsed;
};

const buildOptions = (values: Record<string, unknown>): CliOptions => ({
	config: optionalString(values.config, "--config"),
	componentsDir: optionalString(values.componentsDir, "--components-dir"),
	json: Boolean(values.json),
	timeoutMs: positiveNumber(values.timeoutMs, "--timeout-ms"),
	silent: Boolean(values.silent),
	verbose: Boolean(values.verbose),
});

const assertNoPositionals = (command: CommandName, positionals: string[]) => {
	if (positionals.length > 0) {
		throw new UsageError(
			`${CLI_NAME} ${command}: unexpected arguments: ${positionals.join(" ")}`,
		);
	}
};

const assertSelection = (
	command: CommandName,
	positionals: string[],
	all: boolean,
) => {
	if (all && positionals.length > 0) {
		throw new UsageError(
			`${CLI_NAME} ${command}: pass component names or --all, not both.`,
		);
	}
	if (!all && positionals.length === 0) {
		throw new UsageError(`Usage: ${CLI_NAME} ${command} <component...> | --all`);
	}
};

const buildParsedCommand = (
	command: CommandName | null,
	values: Record<string, unknown>,
	options: CliOptions,
	positionals: string[],
): CliCommand => {
	const all = Boolean(values.all);
	switch (command) {
		case "install": {
			assertNoPositionals(command, positionals);
			const mode = optionalString(values.mode, "--mode") ?? "dev";
			if (!isInstallMode(mode)) {
				throw new UsageError(`--mode must be one of: ${INSTALL_MODES.join(", ")}.`);
			}
			return { command, mode, options };
		}
		case "update":
			return { command, names: positionals, force: Boolean(values.force), options };
		case "status":
			assertNoPositionals(command, positionals);
			return { command, fetch: values.fetch !== false, options };
		case "lock":
		case "unlock":
		case "rollback":
			assertSelection(command, positionals, all);
			return { command, names: positionals, all, options };
		case "set-version": {
			const [name, version, ...rest] = positionals;
			if (!name || !version || rest.length > 0) {
				throw new UsageError(`Usage: ${CLI_NAME} set-version <component> <version>`);
			}
			return { command, name, version, options };
		}
		case "backups":
			assertNoPositionals(command, positionals);
			return { command, options };
		default:
			return { command: null, options };
	}
};

/** Throws `UsageError` for anything the command line cannot express. */
export const parseArgs = (argv = process.argv): ParsedArgs => {
	const cli = cac(CLI_NAME);

	cli
		.option("--config <path>", "Path to the versions file")
		.option("--components-dir <path>", "Directory holding component checkouts")
		.option("--json", "Output JSON")
		.option("--timeout-ms <n>", "Timeout for each git command in milliseconds")
		.option("--silent", "Suppress non-error output")
		.option("--verbose", "Print every git command")
		.option("-h, --help", "Show help");

	cli
		.command("install", "Clone missing components")
		.option("--mode <mode>", "dev installs version, prod installs locked versions");
	cli
		.command("update [...names]", "Update components to their remote default branch")
		.option("--force", "Stash local changes before updating");
	cli
		.command("status", "Show component and project status")
		.option("--no-fetch", "Compare against cached remote refs");
	cli
		.command("lock [...names]", "Pin components to their current commit")
		.option("--all", "All components");
	cli
		.command("unlock [...names]", "Track latest again")
		.option("--all", "All components");
	cli
		.command("rollback [...names]", "Check out the locked version")
		.option("--all", "All components");
	cli.command("set-version <name> <version>", "Set the version of one component");
	cli.command("backups", "List backups of the versions file");

	const result = cli.parse(argv, { run: false });
	const values: Record<string, unknown> = result.options;
	const matched = cli.matchedCommandName;
	const [first, ...rest] = result.args.map(String);

	let command: CommandName | null = null;
	let positionals = result.args.map(String);
	if (isCommand(matched)) {
		command = matched;
	} else if (first !== undefined) {
		if (!isCommand(first)) {
			throw new UsageError(`Unknown command '${first}'.`);
		}
		command = first;
		positionals = rest;
	}

	const options = buildOptions(values);
	const help = Boolean(values.help);
	return {
		command,
		options,
		positionals,
		help,
		parsed: help
			? { command: null, options }
			: buildParsedCommand(command, values, options, positionals),
	};
};
