/**
 * Segmenter Errors
 */

/**
 * A semantic tree broke one of its invariants. Always a classifier or
 * builder fault, never bad input.
 */
export class SerializationError extends Error {
	constructor(
		message: string,
		public readonly code: "INVARIANT_VIOLATION" | "INVALID_SHAPE",
		public readonly path: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "SerializationError";
	}

	static invariant(path: string, message: string): SerializationError {
		return new SerializationError(`Invariant violated at ${path}: ${message}`, "INVARIANT_VIOLATION", path);
	}

	static invalidShape(shape: "human" | "llm", details: unknown): SerializationError {
		return new SerializationError(`Input is not a valid ${shape} tree`, "INVALID_SHAPE", "$", details);
	}
}

export class ConfigError extends Error {
	constructor(
		message: string,
		public readonly code: "LOAD_FAILED" | "VALIDATION_FAILED",
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "ConfigError";
	}

	static loadFailed(path: string, cause: unknown): ConfigError {
		const reason = cause instanceof Error ? cause.message : String(cause);
		return new ConfigError(`Failed to load YAML from ${path}: ${reason}`, "LOAD_FAILED", cause);
	}

	static validationFailed(issues: Array<{ path: (string | number)[]; message: string }>): ConfigError {
		const errorMessages = issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
		return new ConfigError(`Config validation failed: ${errorMessages}`, "VALIDATION_FAILED", issues);
	}
}
