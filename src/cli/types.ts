import type { InstallMode } from "../types/fleet";

export type CliOptions = {
	config?: string;
	componentsDir?: string;
	json: boolean;
	timeoutMs?: number;
	silent: boolean;
	verbose: boolean;
};

export type CliCommand =
	| { command: "install"; mode: InstallMode; options: CliOptions }
	| { command: "update"; names: string[]; force: boolean; options: CliOptions }
	| { command: "status"; fetch: boolean; options: CliOptions }
	| { command: "lock"; names: string[]; all: boolean; options: CliOptions }
	| { command: "unlock"; names: string[]; all: boolean; options: CliOptions }
	| { command: "rollback"; names: string[]; all: boolean; options: CliOptions }
	| { command: "set-version"; name: string; version: string; options: CliOptions }
	| { command: "backups"; options: CliOptions }
	| { command: null; options: CliOptions };

export type CommandName = NonNullable<CliCommand["command"]>;
