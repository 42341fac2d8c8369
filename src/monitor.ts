import readline from "node:readline";
import { renderStatusSnapshot } from "./cli/ui";
import type { RunRegistry } from "./registry";
import { type Clock, nowMs } from "./timing";

export interface StatusMonitorOptions {
	registry: RunRegistry;
	input: NodeJS.ReadableStream;
	write: (text: string) => void;
	now?: Clock;
}

export interface StatusMonitor {
	stop(): void;
}

/**
 * Prints the in-flight jobs every time a line arrives on `input`.
 * Read-only: it never touches the registry beyond taking a snapshot.
 */
export function startStatusMonitor(options: StatusMonitorOptions): StatusMonitor {
	const now = options.now ?? nowMs;
	const rl = readline.createInterface({ input: options.input, terminal: false });
	let stopped = false;
	let closed = false;

	const shutdown = () => {
		stopped = true;
		if (!closed) rl.close();
	};

	rl.on("line", () => {
		if (stopped) return;
		const entries = options.registry.snapshot();
		options.write(renderStatusSnapshot(entries, now()));
	});
	rl.once("close", () => {
		closed = true;
		stopped = true;
	});
	// A broken control stream ends the monitor the same way EOF does; the batch carries on.
	rl.on("error", shutdown);

	return {
		stop: shutdown,
	};
}
