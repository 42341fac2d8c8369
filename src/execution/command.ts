import { spawn } from "node:child_process";
import { ToolExitError, ToolNotFoundError } from "../errors";

export interface CommandRequest {
	command: string;
	args: string[];
	/** File descriptor the child's stdout is bound to. */
	stdout: number;
}

export interface CommandResult {
	exitCode: number | null;
	signal: NodeJS.Signals | null;
}

/**
 * Runs a command to completion. Resolves with the exit status, rejects only
 * when the process could not be launched.
 */
export type CommandRunner = (request: CommandRequest) => Promise<CommandResult>;

export const spawnCommand: CommandRunner = (request) =>
	new Promise<CommandResult>((resolve, reject) => {
		const child = spawn(request.command, request.args, {
			stdio: ["ignore", request.stdout, "ignore"],
			windowsHide: true,
		});
		let settled = false;
		child.once("error", (error) => {
			if (settled) return;
			settled = true;
			reject(
				isSpawnNotFound(error) ? new ToolNotFoundError(request.command, { cause: error }) : error,
			);
		});
		child.once("exit", (exitCode, signal) => {
			if (settled) return;
			settled = true;
			resolve({ exitCode, signal });
		});
	});

export function isSuccessfulExit(result: CommandResult): boolean {
	return result.exitCode === 0 && result.signal === null;
}

export function exitError(result: CommandResult): ToolExitError {
	return new ToolExitError(result.exitCode, result.signal);
}

function isSpawnNotFound(error: unknown): boolean {
	if (!error || typeof error !== "object") return false;
	if (!("code" in error)) return false;
	return error.code === "ENOENT";
}
