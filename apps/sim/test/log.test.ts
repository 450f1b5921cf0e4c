import { afterEach, describe, expect, it, vi } from "vitest";
import { log, minimumLevel } from "../src/obs/log";

describe("log", () => {
	afterEach(() => {
		vi.restoreAllMocks();
		vi.unstubAllEnvs();
	});

	it("writes one JSON line to the matching console method", () => {
		vi.stubEnv("LOG_LEVEL", "info");
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		log("warn", "match_forfeit", { seed: 4, reason: "timeout" });
		expect(warn).toHaveBeenCalledTimes(1);
		const payload = JSON.parse(String(warn.mock.calls[0]?.[0]));
		expect(payload).toMatchObject({
			level: "warn",
			message: "match_forfeit",
			seed: 4,
			reason: "timeout",
		});
		expect(typeof payload.timestamp).toBe("string");
	});

	it("drops messages below LOG_LEVEL", () => {
		vi.stubEnv("LOG_LEVEL", "warn");
		const info = vi.spyOn(console, "info").mockImplementation(() => {});
		log("info", "move_applied");
		expect(info).not.toHaveBeenCalled();
	});

	it("falls back to info for an unknown level", () => {
		vi.stubEnv("LOG_LEVEL", "loud");
		expect(minimumLevel()).toBe("info");
		vi.stubEnv("LOG_LEVEL", "DEBUG");
		expect(minimumLevel()).toBe("debug");
	});
});
