import { SCORE_NAMES, type ScoreName } from "@isolation/agent";
import { renderAscii } from "@isolation/engine";
import minimist from "minimist";
import { makeGreedyBot } from "./bots/greedyBot";
import { makeRandomLegalBot } from "./bots/randomBot";
import { makeSearchBot } from "./bots/searchBot";
import { playMatch } from "./match";
import { log } from "./obs/log";
import { createTournamentOptions } from "./simulation/config";
import {
	defaultOpponents,
	defaultTestAgents,
	runTournament,
} from "./tournament";
import type { Bot } from "./types";

type Args = ReturnType<typeof minimist>;

type BotType = "random" | "greedy" | "minimax" | "alphabeta" | "id";

const BOT_TYPES: readonly BotType[] = [
	"random",
	"greedy",
	"minimax",
	"alphabeta",
	"id",
];

function isBotType(value: string): value is BotType {
	return BOT_TYPES.some((t) => t === value);
}

function parseScore(value: unknown): ScoreName | undefined {
	if (typeof value !== "string" || value === "") return undefined;
	const match = SCORE_NAMES.find((name) => name === value);
	if (!match) {
		throw new Error(
			`Unknown score "${value}" (expected one of ${SCORE_NAMES.join(", ")})`,
		);
	}
	return match;
}

function makeBot(
	id: string,
	type: string,
	opts: { score?: ScoreName; depth?: number; threshold?: number },
): Bot {
	if (!isBotType(type)) {
		throw new Error(
			`Unknown bot "${type}" (expected one of ${BOT_TYPES.join(", ")})`,
		);
	}
	switch (type) {
		case "random":
			return makeRandomLegalBot(id);
		case "greedy":
			return makeGreedyBot(id, opts.score ?? "improved");
		case "minimax":
		case "alphabeta":
			return makeSearchBot(id, {
				method: type,
				iterative: false,
				searchDepth: opts.depth,
				score: opts.score,
				threshold: opts.threshold,
			});
		case "id":
			return makeSearchBot(id, {
				method: "alphabeta",
				iterative: true,
				score: opts.score,
				threshold: opts.threshold,
			});
	}
}

async function main() {
	const argv: Args = minimist(process.argv.slice(2), {
		string: ["p1", "p2", "score"],
		boolean: ["verbose"],
	});
	const cmd = argv._[0];

	const options = createTournamentOptions({
		games: optionalNum(argv.games),
		timeLimitMs: optionalNum(argv.timeLimit),
		threshold: optionalNum(argv.threshold),
		seed: optionalNum(argv.seed),
		width: optionalNum(argv.width),
		height: optionalNum(argv.height),
		maxTurns: optionalNum(argv.maxTurns),
	});
	const verbose = !!argv.verbose;

	if (cmd === "single") {
		const botOpts = {
			score: parseScore(argv.score),
			depth: optionalNum(argv.depth),
			threshold: options.threshold,
		};
		const p1 = makeBot("P1", String(argv.p1 || "id"), botOpts);
		const p2 = makeBot("P2", String(argv.p2 || "random"), botOpts);
		const result = await playMatch({
			seed: options.seed,
			players: [p1, p2],
			timeLimitMs: options.timeLimitMs,
			maxTurns: options.maxTurns,
			board: { width: options.width, height: options.height },
			verbose,
			record: true,
		});
		if (result.log?.finalState) {
			console.log(renderAscii(result.log.finalState));
		}
		const { log: matchLog, ...rest } = result;
		console.log(
			JSON.stringify({ ...rest, moves: matchLog?.moves ?? [] }, null, 2),
		);
		return;
	}

	if (cmd === "tourney") {
		const { summary } = await runTournament({
			options,
			testAgents: defaultTestAgents(options.threshold),
			opponents: defaultOpponents(options.threshold),
		});
		console.log(JSON.stringify(summary, null, 2));
		for (const [name, record] of Object.entries(summary.results)) {
			console.log(
				`${name}: winRate=${(record.winRate * 100).toFixed(2)}% wins=${record.wins} losses=${record.losses} timeouts=${record.forfeits.timeout} illegal=${record.forfeits.illegal}`,
			);
		}
		return;
	}

	console.error("Usage:");
	console.error(
		"  tsx src/cli.ts single  --p1 id --p2 random --score blend --seed 1 --timeLimit 150 --verbose",
	);
	console.error(
		"  tsx src/cli.ts tourney --games 5 --seed 42 --timeLimit 150 --threshold 10",
	);
	process.exit(1);
}

function optionalNum(v: unknown): number | undefined {
	const n = typeof v === "string" ? Number(v) : typeof v === "number" ? v : Number.NaN;
	return Number.isFinite(n) ? n : undefined;
}

main().catch((e) => {
	log("error", "sim_failed", { error: e instanceof Error ? e.message : String(e) });
	process.exit(1);
});
