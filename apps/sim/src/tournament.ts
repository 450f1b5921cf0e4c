import type { AgentOptions, Clock } from "@isolation/agent";
import { makeGreedyBot } from "./bots/greedyBot";
import { makeRandomLegalBot } from "./bots/randomBot";
import { makeSearchBot } from "./bots/searchBot";
import { playMatch, randomOpening } from "./match";
import { mulberry32 } from "./rng";
import type { TournamentOptions } from "./simulation/config";
import type { Bot, ForfeitReason, MatchResult } from "./types";

export type Contestant = {
	name: string;
	make: (id: string) => Bot;
};

export type ContestantRecord = {
	wins: number;
	losses: number;
	winRate: number;
	forfeits: Record<ForfeitReason, number>;
	/** Wins per opponent name */
	vs: Record<string, number>;
};

export type TournamentSummary = {
	games: number;
	seed: number;
	timeLimitMs: number;
	avgTurns: number;
	results: Record<string, ContestantRecord>;
};

const TEST_ID = "test-agent";
const CPU_ID = "cpu-agent";

function searchContestant(
	name: string,
	options: Partial<AgentOptions>,
): Contestant {
	return { name, make: (id) => makeSearchBot(id, options, { name }) };
}

/** Reference opponents with known relative strength. */
export function defaultOpponents(threshold: number): Contestant[] {
	const minimax = { method: "minimax", iterative: false, searchDepth: 3, threshold } as const;
	const alphabeta = { method: "alphabeta", iterative: false, searchDepth: 5, threshold } as const;
	return [
		{ name: "Random", make: (id) => makeRandomLegalBot(id) },
		{ name: "Greedy", make: (id) => makeGreedyBot(id, "improved") },
		searchContestant("MM_Null", { ...minimax, score: "null" }),
		searchContestant("MM_Open", { ...minimax, score: "open" }),
		searchContestant("MM_Improved", { ...minimax, score: "improved" }),
		searchContestant("AB_Null", { ...alphabeta, score: "null" }),
		searchContestant("AB_Open", { ...alphabeta, score: "open" }),
		searchContestant("AB_Improved", { ...alphabeta, score: "improved" }),
	];
}

/** Agents under evaluation: a baseline and the tuned heuristic. */
export function defaultTestAgents(threshold: number): Contestant[] {
	const iterative = { method: "alphabeta", iterative: true, threshold } as const;
	return [
		searchContestant("ID_Improved", { ...iterative, score: "improved" }),
		searchContestant("Student", { ...iterative, score: "blend" }),
	];
}

/**
 * Every test agent meets every opponent `games` times. Each round starts from
 * a random two-move opening and is played once from each side.
 */
export async function runTournament(opts: {
	options: TournamentOptions;
	testAgents: Contestant[];
	opponents: Contestant[];
	now?: Clock;
}) {
	const { options } = opts;
	const board = { width: options.width, height: options.height };
	const results: Record<string, ContestantRecord> = {};
	const matches: MatchResult[] = [];
	let round = 0;

	for (const agent of opts.testAgents) {
		const record: ContestantRecord = {
			wins: 0,
			losses: 0,
			winRate: 0,
			forfeits: { timeout: 0, illegal: 0 },
			vs: {},
		};

		for (const opponent of opts.opponents) {
			record.vs[opponent.name] = 0;
			for (let i = 0; i < options.games; i++) {
				const seed = (options.seed + round++) >>> 0;
				const openingMoves = randomOpening(board, 2, mulberry32(seed));
				const orders: Array<[Bot, Bot]> = [
					[agent.make(TEST_ID), opponent.make(CPU_ID)],
					[opponent.make(CPU_ID), agent.make(TEST_ID)],
				];

				for (const players of orders) {
					const r = await playMatch({
						seed,
						players,
						timeLimitMs: options.timeLimitMs,
						maxTurns: options.maxTurns,
						board,
						openingMoves,
						now: opts.now,
					});
					matches.push(r);
					if (r.winner === TEST_ID) {
						record.wins++;
						record.vs[opponent.name] = (record.vs[opponent.name] ?? 0) + 1;
					} else {
						record.losses++;
						if (r.loser === TEST_ID && (r.reason === "timeout" || r.reason === "illegal")) {
							record.forfeits[r.reason]++;
						}
					}
				}
			}
		}

		const played = record.wins + record.losses;
		record.winRate = Number((record.wins / Math.max(1, played)).toFixed(4));
		results[agent.name] = record;
	}

	const totalTurns = matches.reduce((sum, r) => sum + r.turns, 0);
	const summary: TournamentSummary = {
		games: matches.length,
		seed: options.seed,
		timeLimitMs: options.timeLimitMs,
		avgTurns: Number((totalTurns / Math.max(1, matches.length)).toFixed(2)),
		results,
	};

	return { summary, results: matches };
}
