import { type Clock, countdown, systemClock } from "@isolation/agent";
import {
	type BoardConfigInput,
	formatCell,
	forecastMove,
	getLegalMoves,
} from "@isolation/engine";
import { Engine } from "./engineAdapter";
import { log } from "./obs/log";
import { mulberry32, pickOne } from "./rng";
import type {
	AgentId,
	Bot,
	Cell,
	ForfeitReason,
	IsolationState,
	MatchLog,
	MatchResult,
} from "./types";

export type PlayMatchOptions = {
	seed: number;
	players: Bot[]; // turn order
	/** Per-turn budget; answering at or after 0 ms left forfeits. */
	timeLimitMs: number;
	maxTurns?: number;
	board?: BoardConfigInput;
	/** Played before the bots take over, alternating from the first player. */
	openingMoves?: Cell[];
	now?: Clock;
	record?: boolean;
	verbose?: boolean;
};

/** Picks `plies` random legal moves from the initial position. */
export function randomOpening(
	board: BoardConfigInput | undefined,
	plies: number,
	rng: () => number,
): Cell[] {
	let state = Engine.createInitialState(["opening-a", "opening-b"], board);
	const moves: Cell[] = [];
	for (let i = 0; i < plies; i++) {
		const legal = getLegalMoves(state);
		if (legal.length === 0) break;
		const move = pickOne(legal, rng);
		moves.push(move);
		state = forecastMove(state, move);
	}
	return moves;
}

export async function playMatch(opts: PlayMatchOptions): Promise<MatchResult> {
	const rng = mulberry32(opts.seed);
	const now = opts.now ?? systemClock;
	const maxTurns = opts.maxTurns ?? Number.POSITIVE_INFINITY;
	const playerIds = opts.players.map((p) => p.id);
	if (playerIds.length !== 2) {
		throw new Error("playMatch requires exactly two players.");
	}
	const [first, second] = playerIds;
	const playerPair: [AgentId, AgentId] = [first, second];

	let state: IsolationState = Engine.createInitialState(playerIds, opts.board);
	for (const cell of opts.openingMoves ?? []) {
		const applied = Engine.applyMove(state, cell);
		if (!applied.ok) {
			throw new Error(
				`Invalid opening move ${formatCell(cell)}: ${applied.error}`,
			);
		}
		state = applied.state;
	}

	const moves: Cell[] = [];

	const logIfNeeded = (): MatchLog | undefined => {
		if (!opts.record) return undefined;
		return {
			seed: opts.seed,
			players: playerPair,
			openingMoves: [...(opts.openingMoves ?? [])],
			moves: [...moves],
			finalState: state,
		};
	};

	const completeMatch = (
		turns: number,
		winner: AgentId | null,
		loser: AgentId | null,
		reason: MatchResult["reason"],
	): MatchResult => {
		const matchResult: MatchResult = {
			seed: opts.seed,
			turns,
			winner,
			loser,
			reason,
			log: logIfNeeded(),
		};
		log("debug", "match_complete", {
			seed: opts.seed,
			turns,
			winner,
			reason,
		});
		return matchResult;
	};

	const forfeit = (
		turn: number,
		bot: Bot,
		reason: ForfeitReason,
		detail: string,
	): MatchResult => {
		const other = playerPair[0] === bot.id ? playerPair[1] : playerPair[0];
		if (opts.verbose) {
			log("warn", "match_forfeit", {
				seed: opts.seed,
				turn,
				bot: bot.name,
				reason,
				detail,
			});
		}
		return completeMatch(turn - 1, other, bot.id, reason);
	};

	for (let turn = 1; turn <= maxTurns; turn++) {
		const terminal = Engine.isTerminal(state);
		if (terminal.ended) {
			return completeMatch(turn - 1, terminal.winner, terminal.loser, "no_moves");
		}

		const active = Engine.currentPlayer(state);
		const bot = opts.players.find((p) => p.id === active);
		if (!bot) throw new Error(`No bot for active player id ${String(active)}`);

		const legalMoves = Engine.listLegalMoves(state);
		const timeLeft = countdown(opts.timeLimitMs, now);

		let move: Cell | null;
		try {
			move = await bot.chooseMove({
				state,
				legalMoves: [...legalMoves],
				turn,
				rng,
				timeLeft,
			});
		} catch (e) {
			return forfeit(turn, bot, "illegal", `bot crashed: ${String(e)}`);
		}

		if (timeLeft() <= 0) {
			return forfeit(turn, bot, "timeout", "answered after the clock ran out");
		}
		if (move === null) {
			return forfeit(turn, bot, "timeout", "no move before the deadline");
		}

		const applied = Engine.applyMove(state, move);
		if (!applied.ok) {
			return forfeit(turn, bot, "illegal", applied.error);
		}
		state = applied.state;
		moves.push(move);

		if (opts.verbose) {
			log("info", "move_applied", {
				seed: opts.seed,
				turn,
				bot: bot.name,
				move: formatCell(move),
			});
		}
	}

	return completeMatch(moves.length, null, null, "maxTurns");
}
