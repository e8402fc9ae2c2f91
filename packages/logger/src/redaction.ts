/**
 * Paths redacted from every log line.
 *
 * Filing bodies can run to megabytes; they never belong in a log line.
 */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
	"html",
	"rawHtml",
	"*.html",
	"*.rawHtml",
	"markup",
	"*.markup",
];

export function mergeRedactPaths(extra: readonly string[] = []): string[] {
	return [...new Set([...DEFAULT_REDACT_PATHS, ...extra])];
}
