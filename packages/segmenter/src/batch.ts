/**
 * Batch Segmentation Driver
 *
 * Segments every filing in a directory and writes both JSON shapes to
 * parallel output directories:
 *
 *   <outputDir>/human_output/<documentId>.json  (indented)
 *   <outputDir>/llm_output/<documentId>.json    (compact)
 *
 * Documents are independent, so they are processed by a small worker pool
 * with no shared state beyond the result lists.
 */

import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { withDocumentContext } from "@form8k/logger";
import type { Logger } from "pino";
import type { ClassificationRule } from "./classifier/index.js";
import { DEFAULT_CONFIG, type SegmenterConfig } from "./config.js";
import { SerializationError } from "./errors.js";
import { log } from "./logger.js";
import { walkTree } from "./nodes.js";
import { segmentFiling } from "./pipeline.js";
import { type DocumentSummary, summarizeDocument } from "./summary.js";

export const HUMAN_OUTPUT_DIR = "human_output";
export const LLM_OUTPUT_DIR = "llm_output";

// ============================================
// Types
// ============================================

export interface BatchOptions {
	inputDir: string;
	outputDir: string;
	config?: SegmenterConfig;
	/** Classification rules in priority order (default: CLASSIFICATION_RULES) */
	rules?: readonly ClassificationRule[];
	logger?: Logger;
	onProgress?: BatchProgressCallback;
}

export type BatchProgressCallback = (progress: {
	documentId: string;
	processed: number;
	total: number;
}) => void;

export interface BatchOutput {
	documentId: string;
	sourcePath: string;
	humanPath: string;
	llmPath: string;
	nodeCount: number;
	issueCount: number;
	summary: DocumentSummary;
}

export interface BatchFailure {
	documentId: string;
	sourcePath: string;
	error: string;
}

export interface BatchResult {
	documentsProcessed: number;
	outputs: BatchOutput[];
	failures: BatchFailure[];
	durationMs: number;
}

interface InputFile {
	fileName: string;
	documentId: string;
}

// ============================================
// Driver
// ============================================

function stem(fileName: string): string {
	return basename(fileName, extname(fileName));
}

/**
 * Input files in name order with their document ids. The id is the base
 * name, or the whole file name when several inputs share a base name
 * (`filing.htm` next to `filing.txt`), so no two documents write the same
 * output file.
 */
async function listInputFiles(inputDir: string, extensions: readonly string[]): Promise<InputFile[]> {
	const entries = await readdir(inputDir, { withFileTypes: true });
	const fileNames = entries
		.filter((entry) => entry.isFile() && extensions.includes(extname(entry.name).toLowerCase()))
		.map((entry) => entry.name)
		.sort();

	const stemCounts = new Map<string, number>();
	for (const fileName of fileNames) {
		stemCounts.set(stem(fileName), (stemCounts.get(stem(fileName)) ?? 0) + 1);
	}

	return fileNames.map((fileName) => ({
		fileName,
		documentId: (stemCounts.get(stem(fileName)) ?? 0) > 1 ? fileName : stem(fileName),
	}));
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Segment all filings in `inputDir`.
 *
 * Read, parse and write failures are recorded per document and the run
 * continues. A SerializationError means the segmenter itself is broken: no
 * further documents are started, and it is rethrown once the documents
 * already in flight have settled.
 *
 * @example
 * ```typescript
 * const result = await processDocuments({ inputDir: "downloaded_html", outputDir: "enhanced_output" });
 * console.log(`${result.documentsProcessed} segmented, ${result.failures.length} failed`);
 * ```
 */
export async function processDocuments(options: BatchOptions): Promise<BatchResult> {
	const startTime = Date.now();
	const config = options.config ?? DEFAULT_CONFIG;
	const logger = options.logger ?? log;

	const humanDir = join(options.outputDir, HUMAN_OUTPUT_DIR);
	const llmDir = join(options.outputDir, LLM_OUTPUT_DIR);
	await mkdir(humanDir, { recursive: true });
	await mkdir(llmDir, { recursive: true });

	const files = await listInputFiles(options.inputDir, config.batch.extensions);
	const queue = [...files];
	const outputs: BatchOutput[] = [];
	const failures: BatchFailure[] = [];
	let processed = 0;
	let fatal: SerializationError | undefined;

	logger.info({ inputDir: options.inputDir, documents: files.length }, "Starting batch segmentation");

	const processOne = async ({ fileName, documentId }: InputFile): Promise<void> => {
		const sourcePath = join(options.inputDir, fileName);
		const docLogger = withDocumentContext(logger, { documentId, sourcePath });

		try {
			const content = await readFile(sourcePath, "utf-8");
			const segmented = segmentFiling(content, { config, rules: options.rules, logger: docLogger, documentId });

			const humanPath = join(humanDir, `${documentId}.json`);
			const llmPath = join(llmDir, `${documentId}.json`);
			await writeFile(humanPath, JSON.stringify(segmented.human, null, 2), "utf-8");
			await writeFile(llmPath, JSON.stringify(segmented.llm), "utf-8");

			const nodeCount = Array.from(walkTree(segmented.document)).length;
			const summary = summarizeDocument(segmented.document);

			outputs.push({
				documentId,
				sourcePath,
				humanPath,
				llmPath,
				nodeCount,
				issueCount: segmented.issues.length,
				summary,
			});
			docLogger.info(
				{
					nodeCount,
					issues: segmented.issues.length,
					counts: summary.counts,
					sectionTitles: summary.sectionTitles,
					leadingParagraphs: summary.leadingParagraphs,
				},
				"Document segmented",
			);
		} catch (error) {
			if (error instanceof SerializationError) {
				docLogger.fatal({ path: error.path, error: error.message }, "Semantic tree invariant violated");
				fatal ??= error;
				// Stop every worker from taking another document
				queue.length = 0;
				return;
			}
			failures.push({ documentId, sourcePath, error: errorMessage(error) });
			docLogger.error({ error: errorMessage(error) }, "Failed to segment document");
		}

		processed++;
		options.onProgress?.({ documentId, processed, total: files.length });
	};

	const workers: Promise<void>[] = [];
	for (let i = 0; i < Math.min(config.batch.concurrency, files.length); i++) {
		workers.push(
			(async () => {
				while (queue.length > 0) {
					const file = queue.shift();
					if (file) {
						await processOne(file);
					}
				}
			})(),
		);
	}
	await Promise.all(workers);

	if (fatal) {
		logger.fatal({ documentsProcessed: outputs.length }, "Batch segmentation aborted");
		throw fatal;
	}

	outputs.sort((a, b) => a.documentId.localeCompare(b.documentId));
	failures.sort((a, b) => a.documentId.localeCompare(b.documentId));

	const durationMs = Date.now() - startTime;
	logger.info(
		{ documentsProcessed: outputs.length, failures: failures.length, durationMs },
		"Batch segmentation complete",
	);

	return {
		documentsProcessed: outputs.length,
		outputs,
		failures,
		durationMs,
	};
}
