export { defaultConcurrency, runBatch, type BatchDeps } from "./batch";
export { createTokenPool, type Release, type TokenPool } from "./concurrency";
export { loadConfig } from "./config";
export { BatchDispatcher, type DispatcherOptions } from "./dispatcher";
export { BatchInputError, OutputFileError, ToolExitError, ToolNotFoundError } from "./errors";
export {
	type CommandRequest,
	type CommandResult,
	type CommandRunner,
	spawnCommand,
} from "./execution/command";
export { buildToolArgs, executeJob, type ExecutorDeps } from "./execution/executor";
export { buildJobs, outputPathFor, parseJobList, readJobList } from "./jobs";
export { startStatusMonitor, type StatusMonitor, type StatusMonitorOptions } from "./monitor";
export { RunRegistry } from "./registry";
export type {
	BatchEvent,
	BatchOptions,
	BatchProgress,
	BatchSummary,
	Config,
	Job,
	JobOutcome,
	JobStatus,
	RunningEntry,
} from "./types";
