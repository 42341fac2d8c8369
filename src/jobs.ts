import { readFile } from "node:fs/promises";
import path from "node:path";
import { BatchInputError } from "./errors";
import type { Job } from "./types";

/** One job name per line, taken verbatim; empty lines are skipped, duplicates are kept. */
export function parseJobList(raw: string): string[] {
	return raw
		.split("\n")
		.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line))
		.filter((line) => line.length > 0);
}

export function outputPathFor(options: {
	outputDir: string;
	imagePath: string;
	jobName: string;
}): string {
	const imageName = path.basename(options.imagePath);
	return path.join(options.outputDir, `${imageName}_${options.jobName}.csv`);
}

export function buildJobs(
	names: readonly string[],
	options: { outputDir: string; imagePath: string },
): Job[] {
	return names.map((name) => ({
		name,
		outputPath: outputPathFor({ ...options, jobName: name }),
	}));
}

export async function readJobList(modulesPath: string): Promise<string[]> {
	let raw: string;
	try {
		raw = await readFile(modulesPath, "utf-8");
	} catch (error) {
		throw new BatchInputError(`Error reading modules file ${modulesPath}`, { cause: error });
	}
	return parseJobList(raw);
}
