export class BatchInputError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "BatchInputError";
	}
}

export class OutputFileError extends Error {
	readonly outputPath: string;

	constructor(outputPath: string, options?: { cause?: unknown }) {
		super(`cannot open output file ${outputPath}${describeCause(options?.cause)}`, options);
		this.name = "OutputFileError";
		this.outputPath = outputPath;
	}
}

export class ToolNotFoundError extends Error {
	constructor(toolPath: string, options?: { cause?: unknown }) {
		super(`analysis tool not found at ${toolPath}`, options);
		this.name = "ToolNotFoundError";
	}
}

export class ToolExitError extends Error {
	readonly exitCode: number | null;
	readonly signal: NodeJS.Signals | null;

	constructor(exitCode: number | null, signal: NodeJS.Signals | null) {
		super(
			signal ? `tool terminated by ${signal}` : `tool exited with code ${exitCode ?? "unknown"}`,
		);
		this.name = "ToolExitError";
		this.exitCode = exitCode;
		this.signal = signal;
	}
}

export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

function describeCause(cause: unknown): string {
	if (cause instanceof Error && cause.message) return `: ${cause.message}`;
	return "";
}
