import type { RunningEntry } from "./types";

/**
 * In-flight jobs keyed by name, with the time each one started.
 *
 * Every job writes here while it runs and the status monitor reads from it.
 * All access goes through `record`, `forget` and `snapshot`; the table itself
 * never leaves the class. Calls run to completion on the event loop, so a
 * snapshot can never observe a half-applied write.
 */
export class RunRegistry {
	readonly #entries = new Map<string, number>();

	/** Inserts the entry, or overwrites the start time of a job with the same name. */
	record(name: string, startedAt: number): void {
		this.#entries.set(name, startedAt);
	}

	forget(name: string): void {
		this.#entries.delete(name);
	}

	/** Point-in-time copy; later writes do not show up in the returned array. */
	snapshot(): RunningEntry[] {
		const out: RunningEntry[] = [];
		for (const [name, startedAt] of this.#entries.entries()) {
			out.push({ name, startedAt });
		}
		return out;
	}

	get size(): number {
		return this.#entries.size;
	}
}
