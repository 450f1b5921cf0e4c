import { pickOne } from "../rng";
import type { Bot } from "../types";

export function makeRandomLegalBot(id: string): Bot {
	return {
		id,
		name: "RandomLegalBot",
		chooseMove: ({ legalMoves, rng }) =>
			legalMoves.length === 0 ? null : pickOne(legalMoves, rng),
	};
}
