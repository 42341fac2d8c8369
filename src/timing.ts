import { performance } from "node:perf_hooks";

export type Clock = () => number;

export function nowMs(): number {
	return performance.now();
}

export function elapsedSince(startedAt: number, now: Clock = nowMs): number {
	return Math.max(0, now() - startedAt);
}

export function formatSeconds(ms: number): string {
	if (!Number.isFinite(ms)) return "0.00";
	return (Math.max(0, ms) / 1000).toFixed(2);
}
