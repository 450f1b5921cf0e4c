export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
	value !== undefined && value in LEVEL_ORDER;

export const minimumLevel = (): LogLevel => {
	const configured = process.env.LOG_LEVEL?.toLowerCase();
	return isLogLevel(configured) ? configured : "info";
};

export const log = (
	level: LogLevel,
	message: string,
	fields?: Record<string, unknown>,
) => {
	if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) return;

	const payload = {
		timestamp: new Date().toISOString(),
		level,
		message,
		...(fields ?? {}),
	};

	// eslint-disable-next-line no-console
	const fn = console[level] ?? console.log;
	fn(JSON.stringify(payload));
};
