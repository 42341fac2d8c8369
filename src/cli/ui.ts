import pc from "picocolors";
import { formatSeconds } from "../timing";
import type { BatchProgress, JobOutcome, RunningEntry } from "../types";

const COLORS = {
	ok: pc.green,
	warning: pc.yellow,
	danger: pc.red,
	dim: pc.white,
	accent: pc.cyan,
};

const STATUS_RULE = "─".repeat(12);

export function stripAnsi(input: string): string {
	// biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape sequence
	return input.replace(/\x1b\[[0-9;]*m/g, "");
}

function cleanLabel(input: string): string {
	return input
		.replace(/[\r\n\t]+/g, " ")
		.replace(/\s+/g, " ")
		.trim();
}

function plural(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

export function renderHeading(text: string): string {
	return COLORS.dim(text);
}

export function renderError(text: string): string {
	return COLORS.danger(text);
}

export function renderBatchStart(jobCount: number, concurrency: number): string {
	return renderHeading(
		`Using up to ${plural(concurrency, "worker")} for ${plural(jobCount, "module")}`,
	);
}

export function renderOutcome(outcome: JobOutcome): string {
	const name = outcome.job.name;
	switch (outcome.status) {
		case "succeeded":
			return `${COLORS.ok("✓")} ${name} completed in ${formatSeconds(outcome.elapsedMs)}s`;
		case "failed":
			return `${COLORS.danger("✗")} ${name} failed: ${cleanLabel(outcome.error.message)}`;
		case "skipped":
			return `${COLORS.warning("⏭")} ${name} skipped: ${cleanLabel(outcome.error.message)}`;
	}
}

/**
 * Status block printed on operator request: header, one `name, N.NNs` line
 * per running module (longest-running first), footer.
 */
export function renderStatusSnapshot(entries: readonly RunningEntry[], now: number): string {
	const sorted = [...entries].sort(
		(a, b) => a.startedAt - b.startedAt || a.name.localeCompare(b.name),
	);
	const lines = [
		"",
		COLORS.accent(`${STATUS_RULE} Currently running modules (${sorted.length}) ${STATUS_RULE}`),
	];
	if (sorted.length === 0) {
		lines.push(renderHeading("(no modules running)"));
	}
	for (const entry of sorted) {
		lines.push(`${entry.name}, ${formatSeconds(now - entry.startedAt)}s`);
	}
	lines.push(COLORS.accent(`${STATUS_RULE} End ${STATUS_RULE}`), "");
	return `${lines.join("\n")}\n`;
}

export function renderTotal(totalMs: number): string {
	return COLORS.ok(`All modules completed in ${formatSeconds(totalMs)} seconds.`);
}

export function createBatchRenderer(write: (line: string) => void): BatchProgress {
	return (event) => {
		switch (event.type) {
			case "batch-start":
				write(renderBatchStart(event.jobCount, event.concurrency));
				break;
			case "job-start":
				write(`Running module: ${event.job.name}`);
				break;
			case "job-end":
				write(renderOutcome(event.outcome));
				break;
		}
	};
}
