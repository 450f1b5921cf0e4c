import {
	type AgentOptions,
	createSearchAgent,
	type Scorer,
} from "@isolation/agent";
import { formatCell } from "@isolation/engine";
import { log } from "../obs/log";
import type { Bot } from "../types";

/** Wraps the search agent; logs how deep each move's search got. */
export function makeSearchBot(
	id: string,
	options: Partial<AgentOptions> = {},
	opts: { name?: string; score?: Scorer } = {},
): Bot {
	const agent = createSearchAgent(options, opts.score);
	const name =
		opts.name ??
		`${agent.options.iterative ? "ID" : `D${agent.options.searchDepth}`}_${agent.options.method}_${agent.options.score}`;
	return {
		id,
		name,
		chooseMove: ({ state, legalMoves, turn, timeLeft }) => {
			const selection = agent.getMove(state, legalMoves, timeLeft);
			log("debug", "search_move", {
				bot: name,
				turn,
				move: formatCell(selection.move),
				score: String(selection.score),
				depth: selection.depth,
				timedOut: selection.timedOut,
			});
			return selection.move;
		},
	};
}
