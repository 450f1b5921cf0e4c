import type { Cell, IsolationState, PlayerSide } from "@isolation/engine";

export type { Cell, IsolationState, PlayerSide } from "@isolation/engine";

/** Milliseconds left in the current turn. Polled, never mutated. */
export type TimeLeft = () => number;

/** Desirability of `state` for `player`; higher is better for that player. */
export type Scorer = (state: IsolationState, player: PlayerSide) => number;

export type ScoredMove = {
	score: number;
	move: Cell | null;
};

export type SearchOutcome =
	| ({ ok: true } & ScoredMove)
	| { ok: false; reason: "timeout" };

export type SearchContext = {
	/**
	 * The side the agent plays; leaves are scored from its point of view. It
	 * must move on the maximizing layers, which the root searches guarantee by
	 * taking it from the root state.
	 */
	player: PlayerSide;
	score: Scorer;
	timeLeft: TimeLeft;
	/** Search aborts once `timeLeft()` is at or below this many milliseconds. */
	threshold: number;
};

/** A root search at a fixed depth, maximizing on the first layer. */
export type RootSearch = (
	state: IsolationState,
	depth: number,
	ctx: SearchContext,
) => SearchOutcome;

export type SearchMethod = "minimax" | "alphabeta";

export type MoveSelection = ScoredMove & {
	/** Deepest fully completed depth, 0 when no search ran or none finished. */
	depth: number;
	timedOut: boolean;
};
