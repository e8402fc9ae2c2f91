import pino, { type Logger, type LoggerOptions } from "pino";
import { mergeRedactPaths } from "./redaction.js";
import type { DocumentContext, NodeLoggerOptions } from "./types.js";

type LoggerState = "active" | "flushing" | "destroyed";

export interface LifecycleLogger extends Logger {
	flush(): Promise<void>;
	destroy(): Promise<void>;
}

function wrapLoggerWithLifecycle(baseLogger: Logger): LifecycleLogger {
	let state: LoggerState = "active";
	let flushPromise: Promise<void> | null = null;

	const wrappedLogger = Object.create(baseLogger) as LifecycleLogger;

	// Drop writes once destroyed
	const logMethods = ["trace", "debug", "info", "warn", "error", "fatal"] as const;
	for (const method of logMethods) {
		const original = baseLogger[method].bind(baseLogger);
		(wrappedLogger as unknown as Record<string, unknown>)[method] = (...args: unknown[]) => {
			if (state === "destroyed") {
				return;
			}
			return (original as (...args: unknown[]) => void)(...args);
		};
	}

	wrappedLogger.flush = async (): Promise<void> => {
		if (state === "destroyed") {
			return;
		}
		if (flushPromise) {
			return flushPromise;
		}
		state = "flushing";
		flushPromise = new Promise<void>((resolve, reject) => {
			baseLogger.flush((error) => {
				state = "active";
				flushPromise = null;
				if (error) {
					reject(error);
					return;
				}
				resolve();
			});
		});
		return flushPromise;
	};

	wrappedLogger.destroy = async (): Promise<void> => {
		if (state === "destroyed") {
			return;
		}
		await wrappedLogger.flush();
		state = "destroyed";
	};

	return wrappedLogger;
}

export function createNodeLogger(options: NodeLoggerOptions): LifecycleLogger {
	const {
		service,
		level = "info",
		environment,
		version,
		pretty,
		redactPaths,
		base = {},
		pinoOptions = {},
	} = options;

	const isPretty = pretty ?? process.env.NODE_ENV === "development";

	const loggerOptions: LoggerOptions = {
		level,
		formatters: {
			level: (label) => ({ severity: label.toUpperCase() }),
			// Child bindings pass through here too; only pid and hostname go
			bindings: ({ pid: _pid, hostname: _hostname, ...rest }) => rest,
		},
		timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
		redact: {
			paths: mergeRedactPaths(redactPaths),
			censor: "[REDACTED]",
		},
		base: {
			service,
			environment,
			version,
			...base,
		},
		...pinoOptions,
	};

	let baseLogger: Logger;

	if (isPretty) {
		baseLogger = pino(
			loggerOptions,
			pino.transport({
				target: "pino-pretty",
				options: {
					colorize: true,
					translateTime: "SYS:HH:MM:ss",
					ignore: "pid,hostname,service,environment,version",
					customColors: "trace:gray,debug:gray,info:gray,warn:yellow,error:red,fatal:red",
					singleLine: true,
				},
			}),
		);
	} else {
		baseLogger = pino(loggerOptions);
	}

	return wrapLoggerWithLifecycle(baseLogger);
}

export function withDocumentContext(logger: Logger, context: DocumentContext): Logger {
	return logger.child({
		documentId: context.documentId,
		sourcePath: context.sourcePath,
		batchId: context.batchId,
	});
}
