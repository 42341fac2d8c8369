#!/usr/bin/env node
import { runBatch } from "../batch";
import { loadConfig } from "../config";
import type { Config } from "../types";
import { detectTool, formatDoctorResult } from "./doctor";
import {
	findArgumentError,
	getFlagValue,
	type RunCommandOptions,
	resolveCommand,
	resolveRunOptions,
} from "./options";
import { createBatchRenderer, renderError, renderHeading, renderTotal } from "./ui";

function printUsage() {
	console.log(`
volrun - Run memory-analysis modules in parallel against one memory image

Usage:
  volrun [run] [-p <tool>] -i <image> -m <modules> -o <output-dir> [-j <count>] [--strict]
  volrun doctor [-p <tool>]

Options:
  --tool, -p      Path to the analysis executable (default: VOLRUN_TOOL, then vol or vol.py on PATH)
  --image, -i     Path to the memory image
  --modules, -m   File listing one module per line (blank lines are skipped)
  --output, -o    Directory for the per-module CSV output (created if missing)
  --jobs, -j      Maximum modules running at once (default: CPU count - 1, at least 1)
  --strict        Exit with code 2 when any module fails

While running:
  Press Enter to list the modules currently running and how long each has taken.

Output:
  One file per module: <output-dir>/<image-name>_<module>.csv

Environment:
  VOLRUN_CONFIG       Config file path (default: ./volrun.config.json, ~/.config/volrun/config.json)
  VOLRUN_TOOL         Default analysis executable
  VOLRUN_CONCURRENCY  Default maximum modules running at once

Examples:
  volrun -p /usr/local/bin/vol -i /cases/host.raw -m modules.txt -o /cases/out
  volrun run -p vol -i host.raw -m modules.txt -o out -j 4
  volrun doctor
`);
}

async function main() {
	const args = process.argv.slice(2);

	if (args.includes("--help") || args.includes("-h")) {
		printUsage();
		process.exit(0);
	}
	if (args.length === 0) {
		printUsage();
		process.exit(1);
	}

	const resolved = resolveCommand(args);
	if (!resolved.ok) {
		console.error(renderError(`Error: ${resolved.error}`));
		printUsage();
		process.exit(1);
	}

	const { command, args: commandArgs } = resolved.value;
	const argumentError = findArgumentError(command, commandArgs);
	if (argumentError) {
		console.error(renderError(`Error: ${argumentError}`));
		process.exit(1);
	}

	let config: Config;
	try {
		config = await loadConfig();
	} catch (error) {
		console.error(renderError(`Error: ${describeError(error)}`));
		process.exit(1);
	}

	if (command === "doctor") {
		runDoctor(commandArgs, config);
		return;
	}

	const options = resolveRunOptions(commandArgs, config);
	if (!options.ok) {
		console.error(renderError(`Error: ${options.error}`));
		process.exit(1);
	}
	await runCommand(options.value);
}

async function runCommand(options: RunCommandOptions) {
	try {
		if (process.stdin.isTTY) {
			console.log(renderHeading("Press Enter to list running modules."));
		}
		const summary = await runBatch(options, {
			progress: createBatchRenderer((line) => console.log(line)),
			statusInput: process.stdin,
			statusOutput: (text) => process.stdout.write(text),
		});
		console.log(renderTotal(summary.totalMs));

		const anyFailed = summary.outcomes.some((outcome) => outcome.status !== "succeeded");
		process.exit(options.strict && anyFailed ? 2 : 0);
	} catch (error) {
		console.error(renderError(describeError(error)));
		process.exit(1);
	}
}

function runDoctor(args: string[], config: Config) {
	const status = detectTool({ explicit: getFlagValue(args, ["--tool", "-p"]), config });
	const result = formatDoctorResult(status);
	process.stdout.write(`${result.lines.join("\n")}\n`);
	process.exit(result.ok ? 0 : 1);
}

function describeError(error: unknown): string {
	if (!(error instanceof Error)) return String(error);
	const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
	return `${error.message}${cause}`;
}

main().catch((error: unknown) => {
	console.error(renderError(describeError(error)));
	process.exit(1);
});
