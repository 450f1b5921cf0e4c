import {
	type Cell,
	getLegalMoves,
	type IsolationState,
} from "@isolation/engine";
import { type AgentOptions, createAgentOptions } from "./config";
import { fixedDepth, iterativeDeepening } from "./deepening";
import { makeScorer } from "./evaluation";
import { alphabetaRoot, minimaxRoot } from "./search";
import type {
	MoveSelection,
	RootSearch,
	Scorer,
	SearchContext,
	SearchMethod,
	TimeLeft,
} from "./types";

const SEARCHES: Record<SearchMethod, RootSearch> = {
	minimax: minimaxRoot,
	alphabeta: alphabetaRoot,
};

export function centerCell(state: IsolationState): Cell {
	return [Math.floor(state.height / 2), Math.floor(state.width / 2)];
}

/**
 * Picks a move for the side to move in `state` before the turn clock runs out.
 *
 * Returns `move: null` when `legalMoves` is empty, or when the clock ran out
 * before depth 1 finished. The caller treats the latter as a lost turn.
 */
export function selectMove(
	state: IsolationState,
	legalMoves: readonly Cell[],
	timeLeft: TimeLeft,
	options: AgentOptions,
	score: Scorer = makeScorer(options.score, {
		aggressiveWeight: options.aggressiveWeight,
	}),
): MoveSelection {
	if (legalMoves.length === 0) {
		return { score: Number.NEGATIVE_INFINITY, move: null, depth: 0, timedOut: false };
	}

	// Opening: nobody has moved yet, take the centre.
	if (getLegalMoves(state).length === state.width * state.height) {
		return { score: 0, move: centerCell(state), depth: 0, timedOut: false };
	}

	const ctx: SearchContext = {
		player: state.activePlayer,
		score,
		timeLeft,
		threshold: options.threshold,
	};
	const search = SEARCHES[options.method];
	const result = options.iterative
		? iterativeDeepening(state, search, ctx)
		: fixedDepth(state, search, options.searchDepth, ctx);

	// A finished search that proved every line lost still has to play something.
	if (result.move === null && result.depth > 0) {
		return { ...result, move: legalMoves[0] ?? null };
	}
	return result;
}

export type SearchAgent = {
	options: AgentOptions;
	getMove: (
		state: IsolationState,
		legalMoves: readonly Cell[],
		timeLeft: TimeLeft,
	) => MoveSelection;
};

export function createSearchAgent(
	options: Partial<AgentOptions> = {},
	score?: Scorer,
): SearchAgent {
	const resolved = createAgentOptions(options);
	const scorer =
		score ??
		makeScorer(resolved.score, { aggressiveWeight: resolved.aggressiveWeight });
	return {
		options: resolved,
		getMove: (state, legalMoves, timeLeft) =>
			selectMove(state, legalMoves, timeLeft, resolved, scorer),
	};
}
