import { createTokenPool } from "./concurrency";
import { toError } from "./errors";
import type { Job, JobOutcome } from "./types";

export interface DispatcherOptions {
	concurrency: number;
	execute: (job: Job) => Promise<JobOutcome>;
}

/**
 * Runs every job with at most `concurrency` executing at once.
 * Jobs are admitted in list order; completion order is whatever the jobs do.
 */
export class BatchDispatcher {
	readonly #jobs: readonly Job[];
	readonly #options: DispatcherOptions;

	constructor(jobs: readonly Job[], options: DispatcherOptions) {
		if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
			throw new RangeError(`concurrency must be a positive integer (got ${options.concurrency})`);
		}
		this.#jobs = jobs;
		this.#options = options;
	}

	/** Resolves with one outcome per job, in job-list order, once all have finished. */
	async runAll(): Promise<JobOutcome[]> {
		const pool = createTokenPool(this.#options.concurrency);
		return await Promise.all(this.#jobs.map((job) => pool.run(() => this.#runOne(job))));
	}

	async #runOne(job: Job): Promise<JobOutcome> {
		try {
			return await this.#options.execute(job);
		} catch (error) {
			// Executors report their own failures; anything thrown here still stays with this job.
			return { status: "failed", job, elapsedMs: 0, error: toError(error) };
		}
	}
}
