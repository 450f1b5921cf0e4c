import { performance } from "node:perf_hooks";
import type { TimeLeft } from "./types";

/** Monotonic milliseconds. */
export type Clock = () => number;

export const systemClock: Clock = () => performance.now();

/** A turn budget of `limitMs` that starts counting down now. */
export function countdown(limitMs: number, now: Clock = systemClock): TimeLeft {
	const start = now();
	return () => limitMs - (now() - start);
}
