import type { AgentId, Cell, IsolationState } from "@isolation/engine";
import type { TimeLeft } from "@isolation/agent";

export type {
	AgentId,
	Cell,
	IsolationState,
	PlayerSide,
	TerminalState,
} from "@isolation/engine";

export type ForfeitReason = "timeout" | "illegal";

export type MatchResult = {
	seed: number;
	turns: number;
	winner: AgentId | null;
	loser: AgentId | null;
	reason: "no_moves" | ForfeitReason | "maxTurns";
	log?: MatchLog;
};

export type MatchLog = {
	seed: number;
	players: [AgentId, AgentId];
	openingMoves: Cell[];
	moves: Cell[];
	finalState?: IsolationState;
};

export type Bot = {
	id: AgentId;
	name: string;
	chooseMove: (ctx: {
		state: IsolationState;
		legalMoves: Cell[];
		turn: number;
		rng: () => number;
		timeLeft: TimeLeft;
	}) => Promise<Cell | null> | Cell | null;
};
