/**
 * Engine adapter: the match driver only talks to the board through this shape.
 */

import {
	applyMove,
	createInitialState,
	currentPlayer,
	getLegalMoves,
	isTerminal,
} from "@isolation/engine";
import type { BoardConfigInput } from "@isolation/engine";
import type { AgentId, Cell, IsolationState } from "./types";

export const Engine = {
	createInitialState(
		players: AgentId[],
		configInput?: BoardConfigInput,
	): IsolationState {
		return createInitialState(configInput, players);
	},

	currentPlayer(state: IsolationState): AgentId {
		return currentPlayer(state);
	},

	isTerminal(state: IsolationState) {
		return isTerminal(state);
	},

	listLegalMoves(state: IsolationState): Cell[] {
		return getLegalMoves(state);
	},

	applyMove(state: IsolationState, move: unknown) {
		return applyMove(state, move);
	},
};
