import process from "node:process";
import { listBackups } from "../config/backup";
import { createFleetContext, type FleetContext, type FleetLogger } from "../context";
import { ConfigSaveError, toErrorMessage, UsageError } from "../errors";
import { ExitCode } from "./exit-code";
import { CLI_NAME, parseArgs } from "./parse-args";
import {
	formatInstallSummary,
	formatUpdateSummary,
	installState,
	outcomeLabel,
	outcomeState,
	printBackups,
	printBatchResult,
	printRebuildHints,
	printStatusReport,
} from "./report";
import { TaskReporter } from "./task-reporter";
import type { CliCommand, CliOptions } from "./types";
import { isSilentMode, setSilentMode, ui } from "./ui";

const HELP_TEXT = `
Usage: ${CLI_NAME} <command> [options]

Commands:
  install [--mode dev|prod]         Clone missing components
  update [name...] [--force]        Update components to origin main/master
  status [--no-fetch]               Show component and project status
  lock <name...> | --all            Pin components to their current commit
  unlock <name...> | --all          Track latest again
  rollback <name...> | --all        Check out the locked version
  set-version <name> <version>      Set a version without touching the checkout
  backups                           List backups of the versions file

Global options:
  --config <path>            Versions file (default: versions.json)
  --components-dir <path>    Component checkouts (default: external)
  --json
  --timeout-ms <n>
  --silent
  --verbose
`;

const printHelp = () => {
	process.stdout.write(HELP_TEXT.trimStart());
};

type Reporting = {
	reporter: TaskReporter | null;
	logger?: FleetLogger;
	warn: FleetLogger;
};

/** Live progress for human output; JSON and silent runs only keep warnings. */
const createReporting = (options: CliOptions, live: boolean): Reporting => {
	if (live && !options.json && !isSilentMode()) {
		const reporter = new TaskReporter();
		return {
			reporter,
			logger: options.verbose ? (message) => reporter.debug(message) : undefined,
			warn: (message) => reporter.warn(message),
		};
	}
	return {
		reporter: null,
		logger: options.verbose
			? (message) => {
					process.stderr.write(`${message}\n`);
				}
			: undefined,
		warn: (message) => ui.warn(message),
	};
};

const toContext = (options: CliOptions, reporting: Reporting): FleetContext =>
	createFleetContext({
		projectDir: process.cwd(),
		configPath: options.config,
		componentsDir: options.componentsDir,
		timeoutMs: options.timeoutMs,
		logger: reporting.logger,
		progressLogger: reporting.logger,
		warn: reporting.warn,
	});

/** Releases the live view when a run aborts before it can finish. */
const withReporter = async <T>(
	reporter: TaskReporter | null,
	run: () => Promise<T>,
): Promise<T> => {
	try {
		return await run();
	} catch (error) {
		reporter?.stop();
		throw error;
	}
};

const runCommand = async (parsed: CliCommand): Promise<ExitCode> => {
	const { options } = parsed;
	switch (parsed.command) {
		case "update": {
			const { updateAll } = await import("../fleet/update");
			const reporting = createReporting(options, true);
			const { reporter } = reporting;
			const report = await withReporter(reporter, () =>
				updateAll(toContext(options, reporting), {
					force: parsed.force,
					only: parsed.names,
					onStart: (name) => reporter?.start(name),
					onOutcome: (outcome) =>
						reporter?.complete(
							outcome.name,
							outcomeState(outcome),
							outcome.details,
							outcomeLabel(outcome),
						),
				}),
			);
			if (options.json) {
				ui.json(report);
			} else if (reporter) {
				reporter.finish(formatUpdateSummary(report));
				printRebuildHints(report);
			}
			return report.summary.ok ? ExitCode.Success : ExitCode.Failure;
		}
		case "install": {
			const { installAll } = await import("../fleet/install");
			const reporting = createReporting(options, true);
			const { reporter } = reporting;
			const report = await withReporter(reporter, () =>
				installAll(toContext(options, reporting), {
					mode: parsed.mode,
					onStart: (name) => reporter?.start(name),
					onEntry: (entry) =>
						reporter?.complete(entry.name, installState(entry), entry.details),
				}),
			);
			if (options.json) {
				ui.json(report);
			} else {
				reporter?.finish(formatInstallSummary(report));
			}
			return report.ok ? ExitCode.Success : ExitCode.Failure;
		}
		case "status": {
			const { statusAll } = await import("../fleet/status");
			const reporting = createReporting(options, false);
			const report = await statusAll(toContext(options, reporting), {
				fetch: parsed.fetch,
			});
			if (options.json) {
				ui.json(report);
			} else {
				printStatusReport(report);
			}
			return ExitCode.Success;
		}
		case "lock":
		case "unlock":
		case "rollback":
		case "set-version": {
			const { lockAll, setVersionAll, unlockAll } = await import("../fleet/versions");
			const { rollbackAll } = await import("../fleet/rollback");
			const context = toContext(options, createReporting(options, false));
			const batches = { lock: lockAll, unlock: unlockAll, rollback: rollbackAll };
			const result =
				parsed.command === "set-version"
					? await setVersionAll(context, {
							names: [parsed.name],
							version: parsed.version,
						})
					: await batches[parsed.command](context, {
							names: parsed.names,
							all: parsed.all,
						});
			if (options.json) {
				ui.json(result);
			} else {
				printBatchResult(result);
			}
			return result.ok ? ExitCode.Success : ExitCode.Failure;
		}
		case "backups": {
			const context = toContext(options, createReporting(options, false));
			const backups = await listBackups(context.configPath);
			if (options.json) {
				ui.json({ configPath: context.configPath, backups });
			} else {
				printBackups(backups);
			}
			return ExitCode.Success;
		}
		default:
			printHelp();
			return ExitCode.InvalidArgument;
	}
};

const exitCodeFor = (error: unknown): ExitCode => {
	if (error instanceof UsageError) return ExitCode.InvalidArgument;
	return ExitCode.Failure;
};

/**
 * The main entry point of the CLI. Sets `process.exitCode` instead of
 * exiting so pending output is flushed.
 */
export async function main(argv = process.argv): Promise<void> {
	try {
		const parsed = parseArgs(argv);
		setSilentMode(parsed.options.silent);

		if (parsed.help) {
			printHelp();
			process.exitCode = ExitCode.Success;
			return;
		}
		process.exitCode = await runCommand(parsed.parsed);
	} catch (error) {
		const message = toErrorMessage(error);
		ui.error(
			error instanceof ConfigSaveError
				? `${message}; the versions file was left unchanged`
				: message,
		);
		if (error instanceof UsageError) {
			printHelp();
		}
		process.exitCode = exitCodeFor(error);
	}
}
