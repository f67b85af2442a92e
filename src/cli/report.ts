import pc from "picocolors";
import { isSuccessfulOutcome } from "../fleet/summary";
import type {
	BatchEntry,
	BatchResult,
	InstallEntry,
	InstallReport,
	StatusReport,
	UpdateReport,
} from "../types/fleet";
import type { ComponentStatus, ProjectStatus, SyncOutcome } from "../types/sync";
import type { TaskState } from "./task-reporter";
import { symbols, ui } from "./ui";

export const outcomeState = (outcome: SyncOutcome): Exclude<TaskState, "running"> => {
	if (outcome.status === "locked") return "info";
	if (isSuccessfulOutcome(outcome)) return "success";
	if (outcome.status === "has-uncommitted-changes") return "warn";
	return "error";
};

export const outcomeLabel = (outcome: SyncOutcome) =>
	`${outcome.name} ${pc.dim(outcome.status)}`;

export const installState = (entry: InstallEntry): Exclude<TaskState, "running"> => {
	if (entry.status === "failed") return "error";
	if (entry.warning) return "warn";
	return entry.status === "present" ? "info" : "success";
};

export const formatUpdateSummary = (report: UpdateReport) => {
	const { summary } = report;
	const icon = summary.ok ? symbols.success : symbols.error;
	return `${icon} ${summary.succeeded}/${summary.total} components succeeded`;
};

export const formatInstallSummary = (report: InstallReport) => {
	const icon = report.ok ? symbols.success : symbols.error;
	const installed = report.entries.length - report.failed.length;
	return `${icon} ${installed}/${report.entries.length} components installed (${report.mode})`;
};

export const printRebuildHints = (report: UpdateReport) => {
	for (const request of report.rebuild) {
		const steps = [
			request.npmInstall ? "npm install" : null,
			request.npmBuild ? "npm run build" : null,
		].filter((step) => step !== null);
		ui.item(symbols.info, request.name, `needs ${steps.join(" && ")} in ${ui.path(request.path)}`);
	}
};

const syncColor = (status: ComponentStatus | ProjectStatus) => {
	switch (status.sync) {
		case "synced":
			return pc.green(status.details);
		case "ahead":
		case "behind":
			return pc.yellow(status.details);
		case "local-only":
		case "no-remote-branch":
			return pc.dim(status.details);
		default:
			return pc.red(status.details);
	}
};

export const formatComponentStatus = (status: ComponentStatus, width: number) => {
	const version = status.locked
		? `${symbols.locked} ${ui.hash(status.version)}`
		: pc.dim("latest");
	if (!status.exists || !status.isRepository) {
		return `  ${symbols.error} ${pc.bold(ui.pad(status.name, width))} ${version} ${syncColor(status)}`;
	}
	const dirty = status.dirty ? ` ${pc.yellow("modified")}` : "";
	const branch = status.branch ?? "-";
	return `  ${status.sync === "synced" && !status.dirty ? symbols.success : symbols.warn} ${pc.bold(ui.pad(status.name, width))} ${version} ${pc.cyan(branch)} ${pc.gray(ui.hash(status.currentCommit))} ${syncColor(status)}${dirty}`;
};

export const printStatusReport = (report: StatusReport) => {
	if (report.project) {
		const project = report.project;
		ui.header(
			"Project",
			`${project.branch ?? "-"} ${ui.hash(project.currentCommit)} ${syncColor(project)}${project.dirty ? ` ${pc.yellow("modified")}` : ""}`,
		);
	}
	const width = Math.max(0, ...report.components.map((status) => status.name.length));
	for (const status of report.components) {
		ui.line(formatComponentStatus(status, width));
	}
	const { summary } = report;
	if (summary.clean) {
		ui.line(`${symbols.success} All components clean and up to date`);
		return;
	}
	const groups: Array<[string, string[]]> = [
		["With local changes", summary.withChanges],
		["Ahead of remote", summary.ahead],
		["Behind remote", summary.behind],
		["Not installed", summary.missing],
	];
	for (const [label, names] of groups) {
		if (names.length > 0) {
			ui.line(`${symbols.warn} ${label}: ${names.join(", ")}`);
		}
	}
};

const batchIcon = (entry: BatchEntry) => {
	if (entry.status === "changed") return symbols.success;
	if (entry.status === "failed") return symbols.error;
	return symbols.info;
};

export const printBatchResult = (result: BatchResult) => {
	for (const entry of result.entries) {
		ui.item(batchIcon(entry), entry.name, entry.details);
	}
	if (result.saved) {
		ui.line(`${symbols.info} Updated ${pc.gray(ui.path(result.saved.path))}`);
		if (result.backupPath) {
			ui.line(`${symbols.info} Backup ${pc.gray(ui.path(result.backupPath))}`);
		}
	} else {
		ui.line(`${symbols.info} Nothing changed`);
	}
};

export const printBackups = (paths: string[]) => {
	if (paths.length === 0) {
		ui.line(`${symbols.info} No backups found`);
		return;
	}
	for (const backupPath of paths) {
		ui.line(ui.path(backupPath));
	}
};
