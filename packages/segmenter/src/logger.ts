import { createNodeLogger, type LifecycleLogger, type LogLevel } from "@form8k/logger";

const LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function levelFromEnv(value: string | undefined): LogLevel {
	return LEVELS.find((level) => level === value) ?? "info";
}

export const log: LifecycleLogger = createNodeLogger({
	service: "segmenter",
	level: levelFromEnv(process.env.LOG_LEVEL),
	environment: process.env.NODE_ENV ?? "development",
	pretty: process.env.NODE_ENV === "development",
});
