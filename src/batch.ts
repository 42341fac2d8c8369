import { mkdir } from "node:fs/promises";
import os from "node:os";
import { BatchDispatcher } from "./dispatcher";
import { BatchInputError } from "./errors";
import type { CommandRunner } from "./execution/command";
import { executeJob } from "./execution/executor";
import { buildJobs, readJobList } from "./jobs";
import { type StatusMonitor, startStatusMonitor } from "./monitor";
import { RunRegistry } from "./registry";
import { type Clock, elapsedSince, nowMs } from "./timing";
import type { BatchOptions, BatchProgress, BatchSummary } from "./types";

export interface BatchDeps {
	runCommand?: CommandRunner;
	registry?: RunRegistry;
	progress?: BatchProgress;
	/** Control stream for the status monitor; no monitor when omitted. */
	statusInput?: NodeJS.ReadableStream;
	statusOutput?: (text: string) => void;
	now?: Clock;
	availableParallelism?: () => number;
}

export function defaultConcurrency(parallelism: number = os.availableParallelism()): number {
	return Math.max(1, Math.floor(parallelism) - 1);
}

/**
 * Runs a whole batch: prepares the output directory, loads the job list,
 * dispatches every job and reports the total wall-clock time.
 *
 * Throws `BatchInputError` before any job starts when the inputs are unusable.
 */
export async function runBatch(options: BatchOptions, deps: BatchDeps = {}): Promise<BatchSummary> {
	const now = deps.now ?? nowMs;
	const registry = deps.registry ?? new RunRegistry();
	const emit = deps.progress ?? (() => undefined);

	try {
		await mkdir(options.outputDir, { recursive: true });
	} catch (error) {
		throw new BatchInputError(`Error creating output directory ${options.outputDir}`, {
			cause: error,
		});
	}

	const names = await readJobList(options.modulesPath);
	const jobs = buildJobs(names, { outputDir: options.outputDir, imagePath: options.imagePath });
	const concurrency = options.concurrency ?? defaultConcurrency(deps.availableParallelism?.());

	const dispatcher = new BatchDispatcher(jobs, {
		concurrency,
		execute: (job) =>
			executeJob(job, {
				toolPath: options.toolPath,
				imagePath: options.imagePath,
				registry,
				runCommand: deps.runCommand,
				now,
				progress: emit,
			}),
	});

	const startedAt = now();
	emit({ type: "batch-start", jobCount: jobs.length, concurrency });

	let monitor: StatusMonitor | undefined;
	if (deps.statusInput) {
		monitor = startStatusMonitor({
			registry,
			input: deps.statusInput,
			write: deps.statusOutput ?? ((text) => process.stdout.write(text)),
			now,
		});
	}

	try {
		const outcomes = await dispatcher.runAll();
		return { outcomes, concurrency, totalMs: elapsedSince(startedAt, now) };
	} finally {
		monitor?.stop();
	}
}
