import { describe, expect, it } from "vitest";
import {
	createTournamentOptions,
	defaultTournamentOptions,
} from "../src/simulation/config";

describe("createTournamentOptions", () => {
	it("applies defaults", () => {
		expect(createTournamentOptions()).toEqual(defaultTournamentOptions);
		expect(createTournamentOptions({ games: 3, seed: undefined })).toEqual({
			...defaultTournamentOptions,
			games: 3,
		});
	});

	it("rejects a threshold that eats the whole clock", () => {
		expect(() =>
			createTournamentOptions({ timeLimitMs: 50, threshold: 50 }),
		).toThrow("Invalid tournament options: threshold: threshold must be below timeLimitMs");
	});

	it("rejects boards too small to play", () => {
		expect(() => createTournamentOptions({ width: 2 })).toThrow(
			"Invalid tournament options: width: width must be at least 3",
		);
	});
});
