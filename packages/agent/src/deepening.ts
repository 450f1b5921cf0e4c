import { countBlankSpaces, type IsolationState } from "@isolation/engine";
import type { MoveSelection, RootSearch, SearchContext } from "./types";

/**
 * Searches at depth 1, 2, 3, ... and keeps the result of the deepest depth
 * that finished. A depth interrupted by the clock is dropped entirely.
 *
 * Every ply fills a blank cell, so once `depth` exceeds the blank count the
 * tree is exhausted and further iterations would repeat the same answer. The
 * loop returns there with `timedOut: false` instead of spinning until the
 * clock runs out, which leaves the rest of the turn unused.
 */
export function iterativeDeepening(
	state: IsolationState,
	search: RootSearch,
	ctx: SearchContext,
): MoveSelection {
	const exhaustiveDepth = countBlankSpaces(state) + 1;
	let best: MoveSelection = {
		score: Number.NEGATIVE_INFINITY,
		move: null,
		depth: 0,
		timedOut: false,
	};

	for (let depth = 1; ; depth++) {
		const outcome = search(state, depth, ctx);
		if (!outcome.ok) return { ...best, timedOut: true };
		best = { score: outcome.score, move: outcome.move, depth, timedOut: false };
		if (depth >= exhaustiveDepth) return best;
	}
}

export function fixedDepth(
	state: IsolationState,
	search: RootSearch,
	depth: number,
	ctx: SearchContext,
): MoveSelection {
	const outcome = search(state, depth, ctx);
	if (!outcome.ok) {
		return {
			score: Number.NEGATIVE_INFINITY,
			move: null,
			depth: 0,
			timedOut: true,
		};
	}
	return { score: outcome.score, move: outcome.move, depth, timedOut: false };
}
