import { z } from "zod";
import { DEFAULT_AGGRESSIVE_WEIGHT, SCORE_NAMES, type ScoreName } from "./evaluation";
import type { SearchMethod } from "./types";

/** Options recognized by the search agent */
export interface AgentOptions {
	/** Fixed search depth; only used when `iterative` is off */
	searchDepth: number;
	/** Evaluation strategy applied at the search frontier */
	score: ScoreName;
	/** Opponent-move penalty for the aggressive chaser */
	aggressiveWeight: number;
	/** Iterative deepening (true) or a single fixed-depth search (false) */
	iterative: boolean;
	method: SearchMethod;
	/** Milliseconds left in the turn at which search gives up */
	threshold: number;
}

export const AgentOptionsSchema = z.object({
	searchDepth: z
		.number()
		.int("searchDepth must be an integer")
		.positive("searchDepth must be a positive number"),
	score: z.enum(SCORE_NAMES),
	aggressiveWeight: z.number().finite("aggressiveWeight must be finite"),
	iterative: z.boolean(),
	method: z.enum(["minimax", "alphabeta"]),
	threshold: z.number().nonnegative("threshold cannot be negative"),
});

export const defaultAgentOptions: AgentOptions = {
	searchDepth: 3,
	score: "blend",
	aggressiveWeight: DEFAULT_AGGRESSIVE_WEIGHT,
	iterative: true,
	method: "minimax",
	threshold: 10,
};

/**
 * Creates full AgentOptions from partial options, applying defaults
 */
export function createAgentOptions(
	options: Partial<AgentOptions> = {},
): AgentOptions {
	const provided = Object.fromEntries(
		Object.entries(options).filter(([, value]) => value !== undefined),
	);
	const merged = { ...defaultAgentOptions, ...provided };

	const result = AgentOptionsSchema.safeParse(merged);

	if (!result.success) {
		const errors = result.error.errors
			.map((e) => `${e.path.join(".")}: ${e.message}`)
			.join("; ");
		throw new Error(`Invalid agent options: ${errors}`);
	}

	return result.data;
}
