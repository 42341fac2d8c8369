import { describe, expect, test } from "vitest";
import { BatchDispatcher } from "../src/dispatcher";
import { RunRegistry } from "../src/registry";
import type { Job, JobOutcome } from "../src/types";
import { delay } from "./helpers/fakeTool";

function jobsNamed(names: string[]): Job[] {
	return names.map((name) => ({ name, outputPath: `out/${name}.csv` }));
}

function trackingExecutor(registry: RunRegistry, delayFor: (job: Job) => number) {
	const tracker: { peak: number; started: string[] } = { peak: 0, started: [] };
	const execute = async (job: Job): Promise<JobOutcome> => {
		tracker.started.push(job.name);
		registry.record(job.name, Date.now());
		tracker.peak = Math.max(tracker.peak, registry.size);
		try {
			await delay(delayFor(job));
			return { status: "succeeded", job, elapsedMs: 0 };
		} finally {
			registry.forget(job.name);
		}
	};
	return { tracker, execute };
}

describe("BatchDispatcher", () => {
	test.each([1, 2, 3, 5, 8])("keeps at most min(%i, jobs) running", async (concurrency) => {
		const jobs = jobsNamed(["a", "b", "c", "d", "e", "f"]);
		const registry = new RunRegistry();
		const { tracker, execute } = trackingExecutor(registry, () => 5);

		const outcomes = await new BatchDispatcher(jobs, { concurrency, execute }).runAll();

		expect(tracker.peak).toBe(Math.min(concurrency, jobs.length));
		expect(outcomes).toHaveLength(jobs.length);
		expect(registry.size).toBe(0);
	});

	test("admits jobs in list order and returns outcomes in list order", async () => {
		const jobs = jobsNamed(["slow", "fast", "medium"]);
		const registry = new RunRegistry();
		const delays: Record<string, number> = { slow: 30, fast: 1, medium: 10 };
		const finished: string[] = [];
		const { tracker, execute } = trackingExecutor(registry, (job) => delays[job.name] ?? 0);

		const outcomes = await new BatchDispatcher(jobs, {
			concurrency: 3,
			execute: async (job) => {
				const outcome = await execute(job);
				finished.push(job.name);
				return outcome;
			},
		}).runAll();

		expect(tracker.started).toEqual(["slow", "fast", "medium"]);
		expect(finished).toEqual(["fast", "medium", "slow"]);
		expect(outcomes.map((outcome) => outcome.job.name)).toEqual(["slow", "fast", "medium"]);
	});

	test("a job that throws fails alone", async () => {
		const jobs = jobsNamed(["pslist", "explode", "netscan"]);
		const outcomes = await new BatchDispatcher(jobs, {
			concurrency: 1,
			execute: async (job) => {
				if (job.name === "explode") throw new Error("unexpected");
				return { status: "succeeded", job, elapsedMs: 1 };
			},
		}).runAll();

		expect(outcomes.map((outcome) => outcome.status)).toEqual(["succeeded", "failed", "succeeded"]);
		const failed = outcomes[1];
		expect(failed.status === "failed" && failed.error.message).toBe("unexpected");
	});

	test("an empty job list finishes immediately", async () => {
		const outcomes = await new BatchDispatcher([], {
			concurrency: 2,
			execute: async (job) => ({ status: "succeeded", job, elapsedMs: 0 }),
		}).runAll();
		expect(outcomes).toEqual([]);
	});

	test("rejects a concurrency below one", () => {
		const execute = async (job: Job): Promise<JobOutcome> => ({
			status: "succeeded",
			job,
			elapsedMs: 0,
		});
		expect(() => new BatchDispatcher([], { concurrency: 0, execute })).toThrow(RangeError);
	});
});
