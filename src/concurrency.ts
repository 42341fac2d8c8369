export type Release = () => void;

export interface TokenPool {
	/** Resolves once a token is free. Waiters are served in call order. */
	acquire(): Promise<Release>;
	/** Runs `task` while holding a token; the token goes back when it settles. */
	run<T>(task: () => Promise<T>): Promise<T>;
	readonly capacity: number;
	readonly inFlight: number;
	readonly waiting: number;
}

/**
 * Fixed-capacity counting semaphore. At most `capacity` holders at a time;
 * the rest queue FIFO.
 */
export function createTokenPool(capacity: number): TokenPool {
	if (!Number.isInteger(capacity) || capacity < 1) {
		throw new RangeError(`concurrency must be a positive integer (got ${capacity})`);
	}

	let inFlight = 0;
	const waiters: Array<(release: Release) => void> = [];

	function issue(): Release {
		let released = false;
		return () => {
			if (released) return;
			released = true;
			const next = waiters.shift();
			if (next) {
				// Hand the token straight to the next waiter; inFlight is unchanged.
				next(issue());
				return;
			}
			inFlight -= 1;
		};
	}

	function acquire(): Promise<Release> {
		if (inFlight < capacity) {
			inFlight += 1;
			return Promise.resolve(issue());
		}
		return new Promise<Release>((resolve) => {
			waiters.push(resolve);
		});
	}

	async function run<T>(task: () => Promise<T>): Promise<T> {
		const release = await acquire();
		try {
			return await task();
		} finally {
			release();
		}
	}

	return {
		acquire,
		run,
		capacity,
		get inFlight() {
			return inFlight;
		},
		get waiting() {
			return waiters.length;
		},
	};
}
