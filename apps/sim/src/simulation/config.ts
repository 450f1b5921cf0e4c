import { z } from "zod";

/** Configuration for a tournament run */
export interface TournamentOptions {
	/** Rounds per pairing; every round is played twice, once from each side */
	games: number;
	/** Per-turn clock for every agent */
	timeLimitMs: number;
	/** Safety margin the search agents stop at */
	threshold: number;
	/** Random seed for the opening moves */
	seed: number;
	width: number;
	height: number;
	/** Safety cap on turns per match */
	maxTurns: number;
}

/** Schema for validating tournament options */
export const TournamentOptionsSchema = z
	.object({
		games: z.number().int().positive("games must be a positive number"),
		timeLimitMs: z.number().positive("timeLimitMs must be a positive number"),
		threshold: z.number().nonnegative("threshold cannot be negative"),
		seed: z.number().int("seed must be an integer"),
		width: z.number().int().min(3, "width must be at least 3"),
		height: z.number().int().min(3, "height must be at least 3"),
		maxTurns: z.number().int().positive("maxTurns must be a positive number"),
	})
	.refine((o) => o.threshold < o.timeLimitMs, {
		message: "threshold must be below timeLimitMs",
		path: ["threshold"],
	});

/** Default configuration values */
export const defaultTournamentOptions: TournamentOptions = {
	games: 5,
	timeLimitMs: 150,
	threshold: 10,
	seed: 42,
	width: 7,
	height: 7,
	maxTurns: 200,
};

/**
 * Creates full TournamentOptions from partial options, applying defaults
 */
export function createTournamentOptions(
	options: Partial<TournamentOptions> = {},
): TournamentOptions {
	const provided = Object.fromEntries(
		Object.entries(options).filter(([, value]) => value !== undefined),
	);
	const merged = { ...defaultTournamentOptions, ...provided };

	const result = TournamentOptionsSchema.safeParse(merged);

	if (!result.success) {
		const errors = result.error.errors
			.map((e) => `${e.path.join(".")}: ${e.message}`)
			.join("; ");
		throw new Error(`Invalid tournament options: ${errors}`);
	}

	return result.data;
}
