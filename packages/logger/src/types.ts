import type { LevelWithSilent, LoggerOptions } from "pino";

export type LogLevel = LevelWithSilent;

export interface NodeLoggerOptions {
	/** Service name stamped on every line */
	service: string;
	level?: LogLevel;
	environment?: string;
	version?: string;
	/** Human-readable single-line output via pino-pretty (defaults to NODE_ENV === "development") */
	pretty?: boolean;
	/** Extra paths to redact, merged with DEFAULT_REDACT_PATHS */
	redactPaths?: readonly string[];
	base?: Record<string, unknown>;
	pinoOptions?: Partial<LoggerOptions>;
}

/**
 * Per-document fields bound to a child logger while a filing is processed.
 */
export interface DocumentContext {
	documentId: string;
	sourcePath?: string;
	batchId?: string;
}
