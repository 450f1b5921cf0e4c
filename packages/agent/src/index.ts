export {
	type AgentOptions,
	AgentOptionsSchema,
	createAgentOptions,
	defaultAgentOptions,
} from "./config";
export { fixedDepth, iterativeDeepening } from "./deepening";
export {
	aggressiveChaser,
	customScore,
	DEFAULT_AGGRESSIVE_WEIGHT,
	distanceToOpponent,
	makeScorer,
	occupancyFraction,
	SCORE_NAMES,
	type ScoreName,
	type ScoreOptions,
} from "./evaluation";
export {
	centerCell,
	createSearchAgent,
	type SearchAgent,
	selectMove,
} from "./player";
export {
	alphabeta,
	alphabetaRoot,
	isOutOfTime,
	minimax,
	minimaxRoot,
	TIMED_OUT,
} from "./search";
export { type Clock, countdown, systemClock } from "./timer";
export type {
	MoveSelection,
	RootSearch,
	ScoredMove,
	Scorer,
	SearchContext,
	SearchMethod,
	SearchOutcome,
	TimeLeft,
} from "./types";
