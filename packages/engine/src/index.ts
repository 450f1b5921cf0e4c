import { z } from "zod";

// Isolation: rectangular grid, knight-style moves, every visited cell stays blocked

export type AgentId = string;
export type PlayerSide = "A" | "B";
/** `[row, col]`, zero based. */
export type Cell = readonly [row: number, col: number];

export type IsolationState = {
	width: number;
	height: number;
	/** Row-major, `true` once a player has occupied the cell. */
	blocked: readonly boolean[];
	locations: Readonly<Record<PlayerSide, Cell | null>>;
	players: Readonly<Record<PlayerSide, AgentId>>;
	activePlayer: PlayerSide;
	moveCount: number;
};

export type TerminalState =
	| { ended: false }
	| { ended: true; winner: AgentId; loser: AgentId };

export type MoveRejectionReason =
	| "invalid_move_schema"
	| "illegal_move"
	| "terminal";

export type ApplyMoveResult =
	| { ok: true; state: IsolationState }
	| {
			ok: false;
			state: IsolationState;
			reason: MoveRejectionReason;
			error: string;
	  };

export type BoardConfig = {
	width: number;
	height: number;
};

export type BoardConfigInput = Partial<BoardConfig>;

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_BOARD: BoardConfig = { width: 7, height: 7 };

const PLAYER_SIDES: PlayerSide[] = ["A", "B"];

// Order matters: search tie-breaks follow enumeration order.
const KNIGHT_OFFSETS: ReadonlyArray<readonly [number, number]> = [
	[-2, -1],
	[-2, 1],
	[-1, -2],
	[-1, 2],
	[1, -2],
	[1, 2],
	[2, -1],
	[2, 1],
];

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

export const CellSchema = z.tuple([z.number().int(), z.number().int()]);

export const BoardConfigSchema = z.object({
	width: z.number().int().min(1, "width must be at least 1"),
	height: z.number().int().min(1, "height must be at least 1"),
});

// ---------------------------------------------------------------------------
// Cell helpers
// ---------------------------------------------------------------------------

export function otherSide(side: PlayerSide): PlayerSide {
	return side === "A" ? "B" : "A";
}

export const opponentOf = otherSide;

export function sameCell(a: Cell | null, b: Cell | null): boolean {
	if (a === null || b === null) return a === b;
	return a[0] === b[0] && a[1] === b[1];
}

export function formatCell(cell: Cell | null): string {
	return cell === null ? "(-1, -1)" : `(${cell[0]}, ${cell[1]})`;
}

function inBounds(state: IsolationState, row: number, col: number): boolean {
	return row >= 0 && row < state.height && col >= 0 && col < state.width;
}

function cellIndex(state: IsolationState, row: number, col: number): number {
	return row * state.width + col;
}

function isBlank(state: IsolationState, row: number, col: number): boolean {
	return (
		inBounds(state, row, col) && !state.blocked[cellIndex(state, row, col)]
	);
}

// ---------------------------------------------------------------------------
// Public API: createInitialState
// ---------------------------------------------------------------------------

export function createInitialState(
	configInput?: BoardConfigInput,
	playersInput?: AgentId[],
): IsolationState {
	const players = playersInput ?? ["player-1", "player-2"];
	if (players.length !== 2) {
		throw new Error("Engine requires exactly two players.");
	}
	const [playerA, playerB] = players;

	const parsed = BoardConfigSchema.safeParse({
		...DEFAULT_BOARD,
		...configInput,
	});
	if (!parsed.success) {
		const errors = parsed.error.errors
			.map((e) => `${e.path.join(".")}: ${e.message}`)
			.join("; ");
		throw new Error(`Invalid board config: ${errors}`);
	}
	const { width, height } = parsed.data;

	return {
		width,
		height,
		blocked: new Array<boolean>(width * height).fill(false),
		locations: { A: null, B: null },
		players: { A: playerA, B: playerB },
		activePlayer: "A",
		moveCount: 0,
	};
}

// ---------------------------------------------------------------------------
// Public API: query functions
// ---------------------------------------------------------------------------

export function currentPlayer(state: IsolationState): AgentId {
	return state.players[state.activePlayer];
}

export function sideOf(state: IsolationState, id: AgentId): PlayerSide | null {
	return PLAYER_SIDES.find((side) => state.players[side] === id) ?? null;
}

export function getPlayerLocation(
	state: IsolationState,
	side: PlayerSide,
): Cell | null {
	return state.locations[side];
}

export function getBlankSpaces(state: IsolationState): Cell[] {
	const cells: Cell[] = [];
	for (let row = 0; row < state.height; row++) {
		for (let col = 0; col < state.width; col++) {
			if (!state.blocked[cellIndex(state, row, col)]) cells.push([row, col]);
		}
	}
	return cells;
}

export function countBlankSpaces(state: IsolationState): number {
	let count = 0;
	for (const cell of state.blocked) {
		if (!cell) count++;
	}
	return count;
}

/**
 * Legal moves for `side` (the side to move by default). A player that has not
 * been placed yet may take any blank cell.
 */
export function getLegalMoves(
	state: IsolationState,
	side: PlayerSide = state.activePlayer,
): Cell[] {
	const location = state.locations[side];
	if (location === null) return getBlankSpaces(state);

	const [row, col] = location;
	const moves: Cell[] = [];
	for (const [dr, dc] of KNIGHT_OFFSETS) {
		const r = row + dr;
		const c = col + dc;
		if (isBlank(state, r, c)) moves.push([r, c]);
	}
	return moves;
}

export function isLoser(state: IsolationState, side: PlayerSide): boolean {
	return (
		state.activePlayer === side && getLegalMoves(state, side).length === 0
	);
}

export function isWinner(state: IsolationState, side: PlayerSide): boolean {
	return isLoser(state, otherSide(side));
}

export function isTerminal(state: IsolationState): TerminalState {
	const side = state.activePlayer;
	if (getLegalMoves(state, side).length > 0) return { ended: false };
	return {
		ended: true,
		winner: state.players[otherSide(side)],
		loser: state.players[side],
	};
}

export function winner(state: IsolationState): AgentId | null {
	const terminal = isTerminal(state);
	return terminal.ended ? terminal.winner : null;
}

// ---------------------------------------------------------------------------
// Public API: forecastMove / applyMove
// ---------------------------------------------------------------------------

/**
 * Returns the state after the side to move occupies `cell`. The input is left
 * untouched and the move is not validated.
 */
export function forecastMove(
	state: IsolationState,
	cell: Cell,
): IsolationState {
	const side = state.activePlayer;
	const blocked = state.blocked.slice();
	blocked[cellIndex(state, cell[0], cell[1])] = true;
	const locations = { ...state.locations };
	locations[side] = [cell[0], cell[1]];
	return {
		...state,
		blocked,
		locations,
		activePlayer: otherSide(side),
		moveCount: state.moveCount + 1,
	};
}

export function validateMove(
	state: IsolationState,
	move: unknown,
):
	| { ok: true; move: Cell }
	| { ok: false; reason: MoveRejectionReason; error: string } {
	if (isTerminal(state).ended) {
		return { ok: false, reason: "terminal", error: "Match already ended." };
	}

	const parsed = CellSchema.safeParse(move);
	if (!parsed.success) {
		return {
			ok: false,
			reason: "invalid_move_schema",
			error: "Invalid move schema.",
		};
	}

	const cell: Cell = parsed.data;
	const legal = getLegalMoves(state).some((m) => sameCell(m, cell));
	if (!legal) {
		return {
			ok: false,
			reason: "illegal_move",
			error: `Cell ${formatCell(cell)} is not a legal move.`,
		};
	}
	return { ok: true, move: cell };
}

export function applyMove(state: IsolationState, move: unknown): ApplyMoveResult {
	const validation = validateMove(state, move);
	if (!validation.ok) {
		return {
			ok: false,
			state,
			reason: validation.reason,
			error: validation.error,
		};
	}
	return { ok: true, state: forecastMove(state, validation.move) };
}

// ---------------------------------------------------------------------------
// Render ASCII
// ---------------------------------------------------------------------------

export function renderAscii(state: IsolationState): string {
	const lines: string[] = [];

	const headerCells: string[] = [];
	for (let col = 0; col < state.width; col++) {
		headerCells.push(String(col).padStart(3));
	}
	lines.push(`   ${headerCells.join("")}`);

	for (let row = 0; row < state.height; row++) {
		const cells: string[] = [];
		for (let col = 0; col < state.width; col++) {
			const here = PLAYER_SIDES.find((side) =>
				sameCell(state.locations[side], [row, col]),
			);
			const content = here
				? here
				: state.blocked[cellIndex(state, row, col)]
					? "#"
					: ".";
			cells.push(`  ${content}`);
		}
		lines.push(`${String(row).padStart(2)} ${cells.join("")}`);
	}

	lines.push("");
	lines.push("Legend: A/B=player, #=blocked, .=blank");
	return lines.join("\n");
}
