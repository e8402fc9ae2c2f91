/**
 * Segmenter Configuration
 *
 * Tunable heuristics of the classifier and batch driver settings.
 * Loaded from YAML with environment-specific overrides.
 */

import { readFile } from "node:fs/promises";
import { deepmergeCustom } from "deepmerge-ts";
import { parse } from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";

// ============================================
// Schemas
// ============================================

/**
 * Heuristic heading detection (headings that are not h1-h6)
 */
export const HeadingConfigSchema = z
	.object({
		/** Longest text still considered a heading */
		maxLength: z.number().int().positive().default(120),
		/** Length at or under which a heading counts as short */
		shortLength: z.number().int().positive().default(60),
		/** Confidence with no supporting signal */
		minConfidence: z.number().min(0).max(1).default(0.6),
		/** Confidence with every supporting signal */
		maxConfidence: z.number().min(0).max(1).default(0.8),
	})
	.refine((value) => value.minConfidence <= value.maxConfidence, {
		message: "minConfidence must not exceed maxConfidence",
	});

export const ParagraphConfigSchema = z.object({
	/** Shortest punctuated run classified as a paragraph */
	minLength: z.number().int().nonnegative().default(20),
});

export const SupplementaryConfigSchema = z.object({
	/** Longest bracketed text classified as supplementary */
	maxLength: z.number().int().positive().default(200),
	/** Footnote markers, matched case-insensitively at the start of the text */
	prefixes: z
		.array(z.string().min(1))
		.default(["*", "†", "‡", "Note:", "Notes:", "See Note", "See accompanying"]),
});

export const BatchConfigSchema = z.object({
	/** Documents segmented at the same time */
	concurrency: z.number().int().positive().max(64).default(4),
	/** Input file extensions, lower-case with leading dot */
	extensions: z.array(z.string().startsWith(".")).default([".htm", ".html", ".txt"]),
});

export const SegmenterConfigSchema = z.object({
	headings: HeadingConfigSchema.default({}),
	paragraph: ParagraphConfigSchema.default({}),
	supplementary: SupplementaryConfigSchema.default({}),
	batch: BatchConfigSchema.default({}),
});

export type HeadingConfig = z.infer<typeof HeadingConfigSchema>;
export type SegmenterConfig = z.infer<typeof SegmenterConfigSchema>;
export type SegmenterConfigInput = z.input<typeof SegmenterConfigSchema>;

/**
 * Defaults used when no configuration is supplied.
 */
export const DEFAULT_CONFIG: SegmenterConfig = SegmenterConfigSchema.parse({});

// ============================================
// Loading
// ============================================

/** Override arrays replace base arrays instead of concatenating */
const mergeConfig = deepmergeCustom({ mergeArrays: false });

/**
 * Validate a partial configuration object and fill in defaults.
 *
 * @throws ConfigError if validation fails
 */
export function resolveConfig(input: unknown = {}): SegmenterConfig {
	const result = SegmenterConfigSchema.safeParse(input ?? {});
	if (!result.success) {
		throw ConfigError.validationFailed(result.error.issues);
	}
	return result.data;
}

async function loadYaml(path: string): Promise<unknown> {
	try {
		const content = await readFile(path, "utf-8");
		return parse(content);
	} catch (error) {
		throw ConfigError.loadFailed(path, error);
	}
}

function isMissingFile(error: unknown): boolean {
	return (
		error instanceof ConfigError &&
		error.details instanceof Error &&
		"code" in error.details &&
		error.details.code === "ENOENT"
	);
}

/**
 * Load configuration with environment-specific overrides
 *
 * Reads `default.yaml` from the config directory, then deep-merges
 * `<environment>.yaml` over it when that file exists.
 *
 * @throws ConfigError if a file cannot be read or validation fails
 */
export async function loadSegmenterConfig(
	environment = "development",
	configDir = "configs",
): Promise<SegmenterConfig> {
	const base = (await loadYaml(`${configDir}/default.yaml`)) ?? {};

	let override: unknown = {};
	try {
		override = (await loadYaml(`${configDir}/${environment}.yaml`)) ?? {};
	} catch (error) {
		if (!isMissingFile(error)) {
			throw error;
		}
		log.debug({ environment, configDir }, "No environment override found, using defaults only");
	}

	if (!isRecord(base) || !isRecord(override)) {
		throw ConfigError.validationFailed([{ path: [], message: "Config root must be a mapping" }]);
	}

	return resolveConfig(mergeConfig(base, override));
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}
