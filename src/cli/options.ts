import { formatSchemaIssues, type RunOptions, runOptionsSchema } from "../schema";
import type { Config } from "../types";
import { findDefaultTool } from "./doctor";

type OptionSpec = { takesValue: boolean };

type CommandOptionSpecs = Record<string, OptionSpec>;

export const COMMANDS = ["run", "doctor"] as const;

export type Command = (typeof COMMANDS)[number];

export const OPTION_SPECS: Record<Command, CommandOptionSpecs> = {
	run: {
		"--tool": { takesValue: true },
		"-p": { takesValue: true },
		"--image": { takesValue: true },
		"-i": { takesValue: true },
		"--modules": { takesValue: true },
		"-m": { takesValue: true },
		"--output": { takesValue: true },
		"-o": { takesValue: true },
		"--jobs": { takesValue: true },
		"-j": { takesValue: true },
		"--strict": { takesValue: false },
	},
	doctor: {
		"--tool": { takesValue: true },
		"-p": { takesValue: true },
	},
};

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface RunCommandOptions extends RunOptions {
	strict: boolean;
}

export function isCommand(value: string | undefined): value is Command {
	return typeof value === "string" && COMMANDS.some((command) => command === value);
}

/** Splits argv into a command and its arguments; bare options imply `run`. */
export function resolveCommand(args: string[]): ParseResult<{ command: Command; args: string[] }> {
	const [first, ...rest] = args;
	if (first === undefined || first.startsWith("-")) {
		return { ok: true, value: { command: "run", args } };
	}
	if (isCommand(first)) {
		return { ok: true, value: { command: first, args: rest } };
	}
	return { ok: false, error: `Unknown command: ${first}` };
}

/** Returns an error message for the first argument the command does not accept. */
export function findArgumentError(command: Command, args: string[]): string | undefined {
	const specs = OPTION_SPECS[command];
	for (let i = 0; i < args.length; i += 1) {
		const arg = args[i];
		if (!arg.startsWith("-")) {
			return `Unexpected argument ${arg}`;
		}
		const spec = specs[arg];
		if (!spec) {
			return `Unknown option ${arg}`;
		}
		if (spec.takesValue) {
			if (i + 1 >= args.length) {
				return `Missing value for ${arg}`;
			}
			i += 1;
		}
	}
	return undefined;
}

/** True when `flag` appears as an option, not as the value of another option. */
export function hasFlag(command: Command, args: string[], flag: string): boolean {
	const specs = OPTION_SPECS[command];
	for (let i = 0; i < args.length; i += 1) {
		const arg = args[i];
		if (arg === flag) return true;
		if (specs[arg]?.takesValue) i += 1;
	}
	return false;
}

export function getFlagValue(args: string[], flags: string[]): string | undefined {
	let value: string | undefined;
	for (let i = 0; i < args.length - 1; i += 1) {
		if (flags.includes(args[i])) {
			// Last occurrence wins.
			value = args[i + 1];
			i += 1;
		}
	}
	return value;
}

/** Flags first, then config (file and environment), then `vol` or `vol.py` on PATH for the tool. */
export function resolveRunOptions(
	args: string[],
	config: Config,
	env: NodeJS.ProcessEnv = process.env,
): ParseResult<RunCommandOptions> {
	const candidate = {
		toolPath: getFlagValue(args, ["--tool", "-p"]) ?? config.toolPath ?? findDefaultTool(env),
		imagePath: getFlagValue(args, ["--image", "-i"]),
		modulesPath: getFlagValue(args, ["--modules", "-m"]),
		outputDir: getFlagValue(args, ["--output", "-o"]) ?? config.outputDir,
		concurrency: getFlagValue(args, ["--jobs", "-j"]) ?? config.concurrency,
	};
	if (!candidate.imagePath || !candidate.modulesPath || !candidate.outputDir) {
		return { ok: false, error: "Options -i, -m and -o are required." };
	}
	if (!candidate.toolPath) {
		return {
			ok: false,
			error: "No analysis tool: pass -p <tool>, set VOLRUN_TOOL, or put vol on PATH.",
		};
	}
	const parsed = runOptionsSchema.safeParse(candidate);
	if (!parsed.success) {
		return { ok: false, error: formatSchemaIssues(parsed.error) };
	}
	return { ok: true, value: { ...parsed.data, strict: hasFlag("run", args, "--strict") } };
}
