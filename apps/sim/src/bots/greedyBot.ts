import { makeScorer, type ScoreName, type Scorer } from "@isolation/agent";
import { forecastMove } from "@isolation/engine";
import { pickOne } from "../rng";
import type { Bot, Cell } from "../types";

/**
 * One-ply lookahead: scores the position after each legal move and picks
 * randomly among the best.
 */
export function makeGreedyBot(
	id: string,
	score: ScoreName | Scorer = "improved",
): Bot {
	const scorer = typeof score === "function" ? score : makeScorer(score);
	return {
		id,
		name: "GreedyBot",
		chooseMove: ({ state, legalMoves, rng }) => {
			if (legalMoves.length === 0) return null;
			let bestScore = Number.NEGATIVE_INFINITY;
			let best: Cell[] = [];
			for (const m of legalMoves) {
				const s = scorer(forecastMove(state, m), state.activePlayer);
				if (s > bestScore) {
					bestScore = s;
					best = [m];
				} else if (s === bestScore) {
					best.push(m);
				}
			}
			return pickOne(best.length ? best : legalMoves, rng);
		},
	};
}
