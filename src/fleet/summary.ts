import type { OutcomeSummary, StatusSummary } from "../types/fleet";
import type { ComponentStatus, SyncOutcome, SyncStatus } from "../types/sync";

const SUCCESS_STATUSES = new Set<SyncStatus>(["up-to-date", "updated", "locked"]);

export const isSuccessfulOutcome = (outcome: SyncOutcome) =>
	SUCCESS_STATUSES.has(outcome.status);

export const summarizeOutcomes = (outcomes: SyncOutcome[]): OutcomeSummary => {
	const succeeded = outcomes.filter(isSuccessfulOutcome).length;
	const failed = outcomes.length - succeeded;
	return { total: outcomes.length, succeeded, failed, ok: failed === 0 };
};

export const summarizeStatus = (components: ComponentStatus[]): StatusSummary => {
	const names = (predicate: (status: ComponentStatus) => boolean) =>
		components.filter(predicate).map((status) => status.name);
	const withChanges = names((status) => status.dirty);
	const ahead = names((status) => status.ahead > 0);
	const behind = names((status) => status.behind > 0);
	const missing = names(
		(status) => status.sync === "missing" || status.sync === "not-a-repository",
	);
	return {
		withChanges,
		ahead,
		behind,
		missing,
		clean:
			withChanges.length === 0 &&
			ahead.length === 0 &&
			behind.length === 0 &&
			missing.length === 0,
	};
};
