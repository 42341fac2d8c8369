import { type FileHandle, open } from "node:fs/promises";
import { OutputFileError, toError } from "../errors";
import type { RunRegistry } from "../registry";
import { type Clock, elapsedSince, nowMs } from "../timing";
import type { BatchProgress, Job, JobOutcome } from "../types";
import { type CommandRunner, exitError, isSuccessfulExit, spawnCommand } from "./command";

export interface ExecutorDeps {
	toolPath: string;
	imagePath: string;
	registry: RunRegistry;
	runCommand?: CommandRunner;
	now?: Clock;
	progress?: BatchProgress;
}

export function buildToolArgs(imagePath: string, jobName: string): string[] {
	return ["-f", imagePath, "-r", "csv", jobName];
}

/**
 * Runs one job: opens its output file, registers it as running, invokes the
 * tool with stdout bound to that file, then deregisters it.
 *
 * Per-job failures come back as outcomes; this never rejects for them.
 */
export async function executeJob(job: Job, deps: ExecutorDeps): Promise<JobOutcome> {
	const runCommand = deps.runCommand ?? spawnCommand;
	const now = deps.now ?? nowMs;
	const emit = deps.progress ?? (() => undefined);

	let handle: FileHandle;
	try {
		handle = await open(job.outputPath, "w");
	} catch (error) {
		const outcome: JobOutcome = {
			status: "skipped",
			job,
			error: new OutputFileError(job.outputPath, { cause: error }),
		};
		emit({ type: "job-end", outcome });
		return outcome;
	}

	const startedAt = now();
	deps.registry.record(job.name, startedAt);
	emit({ type: "job-start", job });

	let outcome: JobOutcome;
	try {
		outcome = await runTool(job, handle.fd, startedAt, { ...deps, runCommand, now });
	} finally {
		deps.registry.forget(job.name);
		await handle.close();
	}

	emit({ type: "job-end", outcome });
	return outcome;
}

async function runTool(
	job: Job,
	stdout: number,
	startedAt: number,
	deps: { toolPath: string; imagePath: string; runCommand: CommandRunner; now: Clock },
): Promise<JobOutcome> {
	try {
		const result = await deps.runCommand({
			command: deps.toolPath,
			args: buildToolArgs(deps.imagePath, job.name),
			stdout,
		});
		const elapsedMs = elapsedSince(startedAt, deps.now);
		if (isSuccessfulExit(result)) {
			return { status: "succeeded", job, elapsedMs };
		}
		return { status: "failed", job, elapsedMs, error: exitError(result) };
	} catch (error) {
		return {
			status: "failed",
			job,
			elapsedMs: elapsedSince(startedAt, deps.now),
			error: toError(error),
		};
	}
}
