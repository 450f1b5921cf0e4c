import {
	type Cell,
	type IsolationState,
	type PlayerSide,
	createInitialState,
} from "@isolation/engine";
import type { Scorer, TimeLeft } from "../src/types";

/** Builds a position directly: both locations plus any extra blocked cells. */
export function buildState(opts: {
	width: number;
	height: number;
	A: Cell | null;
	B: Cell | null;
	blocked?: Cell[];
	active?: PlayerSide;
}): IsolationState {
	const base = createInitialState({ width: opts.width, height: opts.height }, [
		"agent-a",
		"agent-b",
	]);
	const blocked = base.blocked.slice();
	const occupied = [opts.A, opts.B, ...(opts.blocked ?? [])];
	for (const cell of occupied) {
		if (cell) blocked[cell[0] * opts.width + cell[1]] = true;
	}
	return {
		...base,
		blocked,
		locations: { A: opts.A, B: opts.B },
		activePlayer: opts.active ?? "A",
		moveCount: occupied.filter((cell) => cell !== null).length,
	};
}

export const unlimited: TimeLeft = () => Number.POSITIVE_INFINITY;

/** Plenty of time for the first `polls` queries, none afterwards. */
export function pollBudget(polls: number): TimeLeft & { calls: () => number } {
	let calls = 0;
	const timeLeft = () => {
		calls++;
		return calls <= polls ? 1_000 : 0;
	};
	return Object.assign(timeLeft, { calls: () => calls });
}

export function countingScorer(inner: Scorer): Scorer & { calls: () => number } {
	let calls = 0;
	const score: Scorer = (state, player) => {
		calls++;
		return inner(state, player);
	};
	return Object.assign(score, { calls: () => calls });
}

export const flatScore: Scorer = () => 0;
