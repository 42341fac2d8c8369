export interface Job {
	name: string;
	outputPath: string;
}

export type JobOutcome =
	| { status: "succeeded"; job: Job; elapsedMs: number }
	| { status: "failed"; job: Job; elapsedMs: number; error: Error }
	| { status: "skipped"; job: Job; error: Error };

export type JobStatus = JobOutcome["status"];

export interface RunningEntry {
	name: string;
	startedAt: number;
}

export type BatchEvent =
	| { type: "batch-start"; jobCount: number; concurrency: number }
	| { type: "job-start"; job: Job }
	| { type: "job-end"; outcome: JobOutcome };

export type BatchProgress = (event: BatchEvent) => void;

export interface BatchOptions {
	toolPath: string;
	imagePath: string;
	modulesPath: string;
	outputDir: string;
	concurrency?: number;
}

export interface BatchSummary {
	outcomes: JobOutcome[];
	concurrency: number;
	totalMs: number;
}

export interface Config {
	toolPath?: string;
	outputDir?: string;
	concurrency?: number;
}
