import {
	countBlankSpaces,
	getLegalMoves,
	getPlayerLocation,
	type IsolationState,
	otherSide,
	type PlayerSide,
} from "@isolation/engine";
import type { Scorer } from "./types";

export type ScoreName =
	| "aggressive_chaser"
	| "mobility_ratio"
	| "blend"
	| "null"
	| "open"
	| "improved";

export const SCORE_NAMES = [
	"aggressive_chaser",
	"mobility_ratio",
	"blend",
	"null",
	"open",
	"improved",
] as const satisfies readonly ScoreName[];

export const DEFAULT_AGGRESSIVE_WEIGHT = 2;

type Mobility = { own: number; opp: number };

// ---------------------------------------------------------------------------
// Board features
// ---------------------------------------------------------------------------

/** Fraction of cells already occupied, 0 on an empty board. */
export function occupancyFraction(state: IsolationState): number {
	const total = state.width * state.height;
	return (total - countBlankSpaces(state)) / total;
}

/** Taxicab distance between both players, 0 while either is unplaced. */
export function distanceToOpponent(
	state: IsolationState,
	player: PlayerSide,
): number {
	const own = getPlayerLocation(state, player);
	const opp = getPlayerLocation(state, otherSide(player));
	if (own === null || opp === null) return 0;
	return Math.abs(own[0] - opp[0]) + Math.abs(own[1] - opp[1]);
}

function mobility(state: IsolationState, player: PlayerSide): Mobility {
	return {
		own: getLegalMoves(state, player).length,
		opp: getLegalMoves(state, otherSide(player)).length,
	};
}

/**
 * `-Infinity` when `player` cannot move, `+Infinity` when the opponent cannot,
 * `null` otherwise. When neither can move, the side to move is the one stuck.
 */
function terminalScore(
	state: IsolationState,
	player: PlayerSide,
	{ own, opp }: Mobility,
): number | null {
	if (own === 0 && opp === 0) {
		return state.activePlayer === player
			? Number.NEGATIVE_INFINITY
			: Number.POSITIVE_INFINITY;
	}
	if (own === 0) return Number.NEGATIVE_INFINITY;
	if (opp === 0) return Number.POSITIVE_INFINITY;
	return null;
}

// ---------------------------------------------------------------------------
// Heuristics (non-terminal positions only)
// ---------------------------------------------------------------------------

type Heuristic = (
	state: IsolationState,
	player: PlayerSide,
	moves: Mobility,
) => number;

export function aggressiveChaser(weight = DEFAULT_AGGRESSIVE_WEIGHT): Heuristic {
	return (_state, _player, { own, opp }) => own - weight * opp;
}

const mobilityRatio: Heuristic = (state, _player, { own }) => {
	const occupancy = occupancyFraction(state);
	return occupancy === 0 ? own : own / occupancy;
};

const blend: Heuristic = (state, player, { own, opp }) =>
	own + distanceToOpponent(state, player) - occupancyFraction(state) - opp;

const nullHeuristic: Heuristic = () => 0;

const openMoves: Heuristic = (_state, _player, { own }) => own;

const improved: Heuristic = (_state, _player, { own, opp }) => own - opp;

function withTerminalCheck(heuristic: Heuristic): Scorer {
	return (state, player) => {
		const moves = mobility(state, player);
		return terminalScore(state, player, moves) ?? heuristic(state, player, moves);
	};
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export type ScoreOptions = {
	aggressiveWeight?: number;
};

export function makeScorer(name: ScoreName, opts: ScoreOptions = {}): Scorer {
	switch (name) {
		case "aggressive_chaser":
			return withTerminalCheck(aggressiveChaser(opts.aggressiveWeight));
		case "mobility_ratio":
			return withTerminalCheck(mobilityRatio);
		case "blend":
			return withTerminalCheck(blend);
		case "null":
			return withTerminalCheck(nullHeuristic);
		case "open":
			return withTerminalCheck(openMoves);
		case "improved":
			return withTerminalCheck(improved);
	}
}

/** The scorer the search uses unless configured otherwise. */
export const customScore: Scorer = makeScorer("blend");
