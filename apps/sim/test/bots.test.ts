import { makeScorer } from "@isolation/agent";
import { createInitialState, forecastMove, getLegalMoves } from "@isolation/engine";
import { describe, expect, it } from "vitest";
import { makeGreedyBot } from "../src/bots/greedyBot";
import { makeRandomLegalBot } from "../src/bots/randomBot";
import { makeSearchBot } from "../src/bots/searchBot";
import { mulberry32, pickOne } from "../src/rng";

// 5x5 with A in the middle and B in a corner, A to move.
const state = forecastMove(
	forecastMove(createInitialState({ width: 5, height: 5 }), [2, 2]),
	[0, 0],
);
const legalMoves = getLegalMoves(state);
const ctx = {
	state,
	legalMoves,
	turn: 3,
	rng: mulberry32(1),
	timeLeft: () => 1_000,
};

describe("bots", () => {
	it("random bot returns a legal move", async () => {
		const move = await makeRandomLegalBot("P1").chooseMove(ctx);
		expect(legalMoves).toContainEqual(move);
	});

	it("random bot returns null without legal moves", async () => {
		expect(await makeRandomLegalBot("P1").chooseMove({ ...ctx, legalMoves: [] })).toBeNull();
	});

	it("greedy bot takes the move with the best one-ply score", async () => {
		const score = makeScorer("open");
		const best = Math.max(...legalMoves.map((m) => score(forecastMove(state, m), "A")));
		const move = await makeGreedyBot("P1", "open").chooseMove(ctx);
		expect(move).not.toBeNull();
		if (move) expect(score(forecastMove(state, move), "A")).toBe(best);
	});

	it("search bot answers with the agent's move", async () => {
		const bot = makeSearchBot("P1", { iterative: false, searchDepth: 1, score: "null" });
		expect(bot.name).toBe("D1_minimax_null");
		// Flat scores keep the first knight move from (2, 2).
		expect(await bot.chooseMove(ctx)).toEqual([0, 1]);
	});
});

describe("rng", () => {
	it("pickOne refuses an empty array", () => {
		expect(() => pickOne([], mulberry32(1))).toThrow("pickOne called with empty array");
	});

	it("mulberry32 yields values in [0, 1)", () => {
		const rng = mulberry32(123);
		for (let i = 0; i < 100; i++) {
			const v = rng();
			expect(v).toBeGreaterThanOrEqual(0);
			expect(v).toBeLessThan(1);
		}
	});
});
