import pc from "picocolors";
import { createLiveOutput, type LiveOutput } from "./live-output";
import { symbols } from "./ui";

export type TaskState = "running" | "success" | "info" | "warn" | "error";

const ICONS: Record<Exclude<TaskState, "running">, string> = {
	success: symbols.success,
	info: symbols.info,
	warn: symbols.warn,
	error: symbols.error,
};

const formatDuration = (ms: number) => {
	const seconds = Math.max(0, ms / 1000);
	if (seconds < 60) {
		return `${seconds.toFixed(1)}s`;
	}
	const minutes = Math.floor(seconds / 60);
	const remainder = seconds % 60;
	return `${minutes}m ${remainder.toFixed(1)}s`;
};

export type TaskReporterOptions = {
	maxLiveLines?: number;
	output?: LiveOutput;
	/** Redraw the view while tasks run; defaults to whether stdout is a TTY. */
	live?: boolean;
	now?: () => number;
};

/**
 * Progress view for a sequential run over components: finished components
 * stay on screen, the running one and its latest git output are redrawn.
 */
export class TaskReporter {
	private readonly output: LiveOutput;
	private readonly maxLiveLines: number;
	private readonly live: boolean;
	private readonly now: () => number;
	private readonly startTime: number;
	private readonly tasks = new Map<string, TaskState>();
	private readonly results: string[] = [];
	private readonly liveLines: string[] = [];
	private timer: NodeJS.Timeout | null = null;
	private warnings = 0;
	private errors = 0;

	constructor(options: TaskReporterOptions = {}) {
		this.output = options.output ?? createLiveOutput();
		this.maxLiveLines = options.maxLiveLines ?? 4;
		this.live = options.live ?? Boolean(process.stdout.isTTY);
		this.now = options.now ?? Date.now;
		this.startTime = this.now();
		this.startTimer();
	}

	start(label: string) {
		this.tasks.set(label, "running");
		this.liveLines.length = 0;
		this.render();
	}

	/**
	 * Ends the task started as `label` and records a result line, shown as
	 * `display` when the finished task reads differently from its start.
	 */
	complete(
		label: string,
		state: Exclude<TaskState, "running">,
		details?: string,
		display = label,
	) {
		if (state === "warn") this.warnings += 1;
		if (state === "error") this.errors += 1;
		this.tasks.set(label, state);
		this.results.push(this.formatLine(ICONS[state], display, details));
		this.liveLines.length = 0;
		this.render();
	}

	/** A warning that does not end a task. */
	warn(message: string) {
		this.warnings += 1;
		this.results.push(`  ${symbols.warn} ${pc.yellow(message)}`);
		this.render();
	}

	debug(text: string) {
		this.liveLines.push(pc.dim(text));
		if (this.liveLines.length > this.maxLiveLines) {
			this.liveLines.splice(0, this.liveLines.length - this.maxLiveLines);
		}
		this.render();
	}

	finish(summary?: string) {
		this.liveLines.length = 0;
		const durationMs = this.now() - this.startTime;
		const parts = [`Completed in ${formatDuration(durationMs)}`];
		if (this.warnings) parts.push(`${this.warnings} warning${this.warnings === 1 ? "" : "s"}`);
		if (this.errors) parts.push(`${this.errors} error${this.errors === 1 ? "" : "s"}`);
		const suffix = parts.join(" · ");
		const message = summary ? `${summary} · ${suffix}` : `${symbols.info} ${suffix}`;
		this.output.persist(this.composeView([message]));
		this.stopTimer();
	}

	stop() {
		this.output.stop();
		this.stopTimer();
	}

	private render() {
		if (!this.live) return;
		this.output.render(this.composeView());
	}

	private startTimer() {
		if (!this.live) return;
		this.timer = setInterval(() => {
			if (this.hasRunningTasks()) {
				this.render();
			}
		}, 250);
		this.timer.unref?.();
	}

	private stopTimer() {
		if (!this.timer) return;
		clearInterval(this.timer);
		this.timer = null;
	}

	private composeView(extraFooter: string[] = []) {
		const running = Array.from(this.tasks.entries())
			.filter(([, state]) => state === "running")
			.map(([label]) => `  ${pc.cyan("→")} ${label}`);
		const elapsed = this.hasRunningTasks()
			? pc.dim(`time: ${formatDuration(this.now() - this.startTime)}`)
			: "";
		const lines = [
			...this.results,
			...running,
			...this.liveLines,
			elapsed,
			...extraFooter,
		].filter((line) => line.length > 0);
		return lines.length > 0 ? lines : [" "];
	}

	private hasRunningTasks() {
		for (const state of this.tasks.values()) {
			if (state === "running") return true;
		}
		return false;
	}

	private formatLine(icon: string, label: string, details?: string) {
		const partLabel = pc.bold(label);
		const partDetails = details ? pc.gray(details) : "";
		return `  ${icon} ${partLabel} ${partDetails}`.trimEnd();
	}
}
