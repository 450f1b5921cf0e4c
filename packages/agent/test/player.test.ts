import {
	createInitialState,
	forecastMove,
	getLegalMoves,
} from "@isolation/engine";
import { describe, expect, it, vi } from "vitest";
import { createAgentOptions } from "../src/config";
import { fixedDepth } from "../src/deepening";
import { customScore } from "../src/evaluation";
import { createSearchAgent, selectMove } from "../src/player";
import { alphabetaRoot } from "../src/search";
import { buildState, pollBudget, unlimited } from "./helpers";

const open5 = buildState({ width: 5, height: 5, A: [2, 2], B: [0, 0] });

describe("selectMove", () => {
	it("returns no move for an empty legal-move list without searching", () => {
		const timeLeft = vi.fn(unlimited);
		const selection = selectMove(open5, [], timeLeft, createAgentOptions());
		expect(selection.move).toBeNull();
		expect(timeLeft).not.toHaveBeenCalled();
	});

	it("opens in the centre of a fresh 7x7 board", () => {
		const state = createInitialState({ width: 7, height: 7 });
		const timeLeft = vi.fn(unlimited);
		const selection = selectMove(
			state,
			getLegalMoves(state),
			timeLeft,
			createAgentOptions(),
		);
		expect(selection.move).toEqual([3, 3]);
		expect(timeLeft).not.toHaveBeenCalled();
	});

	it("opens at row height/2, column width/2 on a rectangular board", () => {
		const state = createInitialState({ width: 5, height: 3 });
		const selection = selectMove(
			state,
			getLegalMoves(state),
			unlimited,
			createAgentOptions(),
		);
		expect(selection.move).toEqual([1, 2]);
	});

	it("searches for the second player's first move", () => {
		const state = forecastMove(createInitialState(), [3, 3]);
		const timeLeft = vi.fn(unlimited);
		const options = createAgentOptions({ iterative: false, searchDepth: 1 });
		const selection = selectMove(state, getLegalMoves(state), timeLeft, options);
		expect(timeLeft).toHaveBeenCalled();
		expect(selection.depth).toBe(1);
		expect(selection.move).not.toBeNull();
	});

	it("uses a single fixed-depth search when iterative deepening is off", () => {
		const options = createAgentOptions({
			iterative: false,
			searchDepth: 2,
			method: "alphabeta",
		});
		const selection = selectMove(open5, getLegalMoves(open5), unlimited, options);
		const reference = fixedDepth(open5, alphabetaRoot, 2, {
			player: "A",
			score: customScore,
			timeLeft: unlimited,
			threshold: options.threshold,
		});
		expect(selection).toEqual(reference);
	});

	it("falls back to no move when even depth 1 runs out of time", () => {
		const selection = selectMove(
			open5,
			getLegalMoves(open5),
			() => 0,
			createAgentOptions({ method: "alphabeta" }),
		);
		expect(selection).toEqual({
			score: Number.NEGATIVE_INFINITY,
			move: null,
			depth: 0,
			timedOut: true,
		});
	});

	it("returns the deepest completed move when the clock runs out", () => {
		const selection = selectMove(
			open5,
			getLegalMoves(open5),
			pollBudget(200),
			createAgentOptions(),
		);
		expect(selection.timedOut).toBe(true);
		expect(selection.depth).toBeGreaterThan(0);
		expect(getLegalMoves(open5)).toContainEqual(selection.move);
	});

	it("still plays a legal move when every line loses", () => {
		// A's only move is (1, 2), after which A is stuck while B is not.
		const doomed = buildState({
			width: 3,
			height: 3,
			A: [0, 0],
			B: [2, 2],
			blocked: [
				[2, 1],
				[2, 0],
			],
		});
		const selection = selectMove(
			doomed,
			getLegalMoves(doomed),
			unlimited,
			createAgentOptions({ iterative: false, searchDepth: 1 }),
		);
		expect(selection.score).toBe(Number.NEGATIVE_INFINITY);
		expect(selection.move).toEqual([1, 2]);
	});
});

describe("createSearchAgent", () => {
	it("resolves defaults", () => {
		const agent = createSearchAgent();
		expect(agent.options).toEqual({
			searchDepth: 3,
			score: "blend",
			aggressiveWeight: 2,
			iterative: true,
			method: "minimax",
			threshold: 10,
		});
	});

	it("scores leaves with an injected scorer", () => {
		const score = vi.fn(customScore);
		const agent = createSearchAgent({ iterative: false, searchDepth: 1 }, score);
		agent.getMove(open5, getLegalMoves(open5), unlimited);
		expect(score).toHaveBeenCalledTimes(8);
	});
});
