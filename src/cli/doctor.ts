import { existsSync } from "node:fs";
import path from "node:path";
import type { Config } from "../types";

const DEFAULT_TOOL_NAMES = ["vol", "vol.py"];

export interface DoctorResult {
	ok: boolean;
	lines: string[];
}

export type ToolStatus =
	| { kind: "present"; toolPath: string; message: string }
	| { kind: "missing"; message: string };

export function detectTool(
	options: { explicit?: string; config?: Config },
	env: NodeJS.ProcessEnv = process.env,
): ToolStatus {
	const configured = (options.explicit ?? options.config?.toolPath)?.trim();
	if (configured && configured.length > 0) {
		const resolved = resolveConfiguredTool(configured, env);
		if (resolved) {
			return {
				kind: "present",
				toolPath: resolved,
				message:
					resolved === configured
						? `analysis tool: found at ${resolved} (configured)`
						: `analysis tool: found at ${resolved} (configured as ${configured})`,
			};
		}
		return {
			kind: "missing",
			message: `analysis tool: configured path not found (${configured})`,
		};
	}

	const fromPath = findDefaultTool(env);
	if (fromPath) {
		return {
			kind: "present",
			toolPath: fromPath,
			message: `analysis tool: found at ${fromPath} (PATH)`,
		};
	}

	return {
		kind: "missing",
		message: `analysis tool: none of ${DEFAULT_TOOL_NAMES.join(", ")} found on PATH`,
	};
}

/** First of `vol`, `vol.py` on PATH; what `run` uses when no tool is configured. */
export function findDefaultTool(env: NodeJS.ProcessEnv = process.env): string | undefined {
	for (const name of DEFAULT_TOOL_NAMES) {
		const fromPath = findExecutableOnPath(name, env);
		if (fromPath) return fromPath;
	}
	return undefined;
}

export function formatDoctorResult(status: ToolStatus): DoctorResult {
	if (status.kind === "present") {
		return {
			ok: true,
			lines: ["✅ Doctor: analysis tool OK", `- ${status.message}`],
		};
	}

	return {
		ok: false,
		lines: [
			"❌ Doctor: analysis tool missing",
			`- ${status.message}`,
			"- Install Volatility 3 so that `vol` is on PATH,",
			"  or pass -p <path> / set VOLRUN_TOOL / toolPath in volrun.config.json.",
		],
	};
}

function resolveConfiguredTool(configured: string, env: NodeJS.ProcessEnv): string | null {
	if (looksLikePath(configured)) {
		return existsSync(configured) ? configured : null;
	}
	return findExecutableOnPath(configured, env);
}

function looksLikePath(value: string): boolean {
	return (
		path.isAbsolute(value) || value.includes("/") || value.includes("\\") || value.startsWith(".")
	);
}

function findExecutableOnPath(command: string, env: NodeJS.ProcessEnv): string | null {
	const pathValue = env.PATH;
	if (!pathValue) return null;
	const dirs = splitPathList(pathValue);
	if (dirs.length === 0) return null;

	const extensions = executableExtensions(env);
	for (const dir of dirs) {
		for (const ext of extensions) {
			const candidate = path.join(dir, `${command}${ext}`);
			if (existsSync(candidate)) {
				return candidate;
			}
		}
	}
	return null;
}

function splitPathList(value: string): string[] {
	return value
		.split(path.delimiter)
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0);
}

function executableExtensions(env: NodeJS.ProcessEnv): string[] {
	if (process.platform !== "win32") return [""];
	const pathext = env.PATHEXT;
	if (pathext) {
		const entries = pathext
			.split(";")
			.map((entry) => entry.trim())
			.filter((entry) => entry.length > 0);
		if (entries.length > 0) {
			return entries;
		}
	}
	return [".EXE", ".CMD", ".BAT", ".COM"];
}
