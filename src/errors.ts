export type ErrnoException = NodeJS.ErrnoException;

export const isErrnoException = (error: unknown): error is ErrnoException =>
	typeof error === "object" &&
	error !== null &&
	"code" in error &&
	(typeof (error as ErrnoException).code === "string" ||
		typeof (error as ErrnoException).code === "number" ||
		(error as ErrnoException).code === undefined);

export const getErrnoCode = (error: unknown): string | undefined =>
	isErrnoException(error) && typeof error.code === "string"
		? error.code
		: undefined;

export const toErrorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

export type FleetErrorKind =
	| "GitCommand"
	| "CloneFailed"
	| "FetchFailed"
	| "RebaseConflict"
	| "ConfigCorrupt"
	| "BackupFailed"
	| "ConfigSave"
	| "InvalidRef"
	| "Usage";

export class FleetError extends Error {
	readonly kind: FleetErrorKind;

	constructor(kind: FleetErrorKind, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
		this.kind = kind;
	}
}

export type GitCommandFailure = {
	args: string[];
	exitCode?: number;
	stderr: string;
	timedOut: boolean;
};

export class GitCommandError extends FleetError {
	readonly args: string[];
	readonly exitCode?: number;
	readonly stderr: string;
	readonly timedOut: boolean;

	constructor(failure: GitCommandFailure, options?: ErrorOptions) {
		const subcommand = failure.args[0] ?? "command";
		const firstLine = failure.stderr.split(/\r?\n/).find(Boolean);
		const reason = failure.timedOut
			? "timed out"
			: `exit ${failure.exitCode ?? "unknown"}`;
		super(
			"GitCommand",
			`git ${subcommand} failed (${reason})${firstLine ? `: ${firstLine}` : ""}`,
			options,
		);
		this.args = failure.args;
		this.exitCode = failure.exitCode;
		this.stderr = failure.stderr;
		this.timedOut = failure.timedOut;
	}
}

export class CloneFailedError extends FleetError {
	constructor(message: string, options?: ErrorOptions) {
		super("CloneFailed", message, options);
	}
}

export class FetchFailedError extends FleetError {
	constructor(message: string, options?: ErrorOptions) {
		super("FetchFailed", message, options);
	}
}

export class RebaseConflictError extends FleetError {
	constructor(message: string, options?: ErrorOptions) {
		super("RebaseConflict", message, options);
	}
}

export class ConfigCorruptError extends FleetError {
	constructor(message: string, options?: ErrorOptions) {
		super("ConfigCorrupt", message, options);
	}
}

export class BackupFailedError extends FleetError {
	constructor(message: string, options?: ErrorOptions) {
		super("BackupFailed", message, options);
	}
}

export class ConfigSaveError extends FleetError {
	constructor(message: string, options?: ErrorOptions) {
		super("ConfigSave", message, options);
	}
}

export class InvalidRefError extends FleetError {
	constructor(message: string) {
		super("InvalidRef", message);
	}
}

export class UsageError extends FleetError {
	constructor(message: string) {
		super("Usage", message);
	}
}
