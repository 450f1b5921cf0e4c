import {
	type Cell,
	forecastMove,
	getLegalMoves,
	type IsolationState,
} from "@isolation/engine";
import type { SearchContext, SearchOutcome } from "./types";

export const TIMED_OUT: SearchOutcome = { ok: false, reason: "timeout" };

export function isOutOfTime(ctx: SearchContext): boolean {
	return ctx.timeLeft() <= ctx.threshold;
}

function leaf(state: IsolationState, ctx: SearchContext): SearchOutcome {
	return { ok: true, score: ctx.score(state, ctx.player), move: null };
}

// ---------------------------------------------------------------------------
// Depth-limited minimax
// ---------------------------------------------------------------------------

/**
 * Plain depth-limited minimax. `ctx.player` must be the side that moves on
 * the maximizing layers; the root wrappers below enforce this. A node without legal moves keeps its initial
 * bound (`-Infinity` when maximizing, `+Infinity` when minimizing) and no move.
 * Ties keep the first move in enumeration order.
 */
export function minimax(
	state: IsolationState,
	depth: number,
	maximizing: boolean,
	ctx: SearchContext,
): SearchOutcome {
	if (isOutOfTime(ctx)) return TIMED_OUT;
	if (depth === 0) return leaf(state, ctx);

	let bestScore = maximizing
		? Number.NEGATIVE_INFINITY
		: Number.POSITIVE_INFINITY;
	let bestMove: Cell | null = null;

	for (const move of getLegalMoves(state)) {
		const child = minimax(forecastMove(state, move), depth - 1, !maximizing, ctx);
		if (!child.ok) return child;
		const better = maximizing
			? child.score > bestScore
			: child.score < bestScore;
		if (better) {
			bestScore = child.score;
			bestMove = move;
		}
	}

	return { ok: true, score: bestScore, move: bestMove };
}

// ---------------------------------------------------------------------------
// Alpha-beta
// ---------------------------------------------------------------------------

/**
 * Minimax with alpha-beta pruning. `alpha` is the score the maximizer can
 * already guarantee, `beta` the one the minimizer can. A node stops expanding
 * children once `beta <= alpha`.
 */
export function alphabeta(
	state: IsolationState,
	depth: number,
	alpha: number,
	beta: number,
	maximizing: boolean,
	ctx: SearchContext,
): SearchOutcome {
	if (isOutOfTime(ctx)) return TIMED_OUT;

	const legalMoves = getLegalMoves(state);
	if (depth === 0 || legalMoves.length === 0) return leaf(state, ctx);

	if (maximizing) {
		let bestScore = Number.NEGATIVE_INFINITY;
		let bestMove: Cell | null = null;
		for (const move of legalMoves) {
			const child = alphabeta(
				forecastMove(state, move),
				depth - 1,
				alpha,
				beta,
				false,
				ctx,
			);
			if (!child.ok) return child;
			if (child.score > bestScore) {
				bestScore = child.score;
				bestMove = move;
			}
			alpha = Math.max(alpha, bestScore);
			if (beta <= alpha) break;
		}
		return { ok: true, score: bestScore, move: bestMove };
	}

	let bestScore = Number.POSITIVE_INFINITY;
	let bestMove: Cell | null = null;
	for (const move of legalMoves) {
		const child = alphabeta(
			forecastMove(state, move),
			depth - 1,
			alpha,
			beta,
			true,
			ctx,
		);
		if (!child.ok) return child;
		if (child.score < bestScore) {
			bestScore = child.score;
			bestMove = move;
		}
		beta = Math.min(beta, bestScore);
		if (beta <= alpha) break;
	}
	return { ok: true, score: bestScore, move: bestMove };
}

// ---------------------------------------------------------------------------
// Root entry points
// ---------------------------------------------------------------------------

/** The root layer maximizes for the side to move, so leaves are scored for it too. */
function rootContext(state: IsolationState, ctx: SearchContext): SearchContext {
	return { ...ctx, player: state.activePlayer };
}

export function minimaxRoot(
	state: IsolationState,
	depth: number,
	ctx: SearchContext,
): SearchOutcome {
	return minimax(state, depth, true, rootContext(state, ctx));
}

export function alphabetaRoot(
	state: IsolationState,
	depth: number,
	ctx: SearchContext,
): SearchOutcome {
	return alphabeta(
		state,
		depth,
		Number.NEGATIVE_INFINITY,
		Number.POSITIVE_INFINITY,
		true,
		rootContext(state, ctx),
	);
}
