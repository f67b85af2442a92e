import path from "node:path";
import pc from "picocolors";
import { toPosixPath } from "../paths";

export const symbols = {
	error: pc.red("✖"),
	success: pc.green("✔"),
	info: pc.blue("ℹ"),
	warn: pc.yellow("⚠"),
	locked: pc.magenta("🔒"),
};

let _silentMode = false;

export const setSilentMode = (silent: boolean) => {
	_silentMode = silent;
};

export const isSilentMode = () => _silentMode;

export const ui = {
	// Formatters
	path: (value: string) => {
		const rel = path.relative(process.cwd(), value);
		const selected = rel && rel.length < value.length ? rel : value;
		return toPosixPath(selected);
	},
	hash: (value: string | null | undefined) => {
		return value ? value.slice(0, 8) : "-";
	},
	plural: (count: number, word: string) =>
		`${count} ${word}${count === 1 ? "" : "s"}`,

	// Layout
	pad: (value: string, length: number) => value.padEnd(length),

	// Components
	line: (text: string = "") => {
		if (_silentMode) return;
		process.stdout.write(`${text}\n`);
	},

	json: (value: unknown) => {
		process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
	},

	header: (label: string, value: string) => {
		if (_silentMode) return;
		process.stdout.write(`${symbols.info} ${label.padEnd(10)} ${value}\n`);
	},

	item: (icon: string, label: string, details?: string) => {
		if (_silentMode) return;
		const partLabel = pc.bold(label);
		const partDetails = details ? pc.gray(details) : "";
		process.stdout.write(`${`  ${icon} ${partLabel} ${partDetails}`.trimEnd()}\n`);
	},

	warn: (message: string) => {
		if (_silentMode) return;
		process.stderr.write(`${symbols.warn} ${message}\n`);
	},

	// Errors are printed even in silent mode.
	error: (message: string) => {
		process.stderr.write(`${symbols.error} ${message}\n`);
	},
};
