#!/usr/bin/env node
/**
 * CLI for segmenting a directory of 8-K filings.
 *
 * Usage: segment-filings <input-dir> <output-dir> [--config-dir configs] [--env development] [--summary]
 *
 * Writes human_output/ and llm_output/ under the output directory. With
 * --summary, prints element counts, section titles and opening paragraphs
 * of every document.
 * Exit code 0 = every document segmented, 1 = failures or bad arguments.
 */

import { parseArgs } from "node:util";
import { processDocuments } from "../batch.js";
import { loadSegmenterConfig } from "../config.js";
import { log } from "../logger.js";
import { formatSummary } from "../summary.js";

const { values, positionals } = parseArgs({
	allowPositionals: true,
	options: {
		"config-dir": { type: "string", default: "configs" },
		env: { type: "string", default: process.env.NODE_ENV ?? "development" },
		summary: { type: "boolean", default: false },
	},
});

const [inputDir, outputDir] = positionals;

if (!inputDir || !outputDir) {
	console.error("Usage: segment-filings <input-dir> <output-dir> [--config-dir dir] [--env name] [--summary]");
	process.exit(1);
}

const config = await loadSegmenterConfig(values.env ?? "development", values["config-dir"] ?? "configs");
const result = await processDocuments({ inputDir, outputDir, config, logger: log });

if (values.summary) {
	for (const output of result.outputs) {
		console.log("");
		console.log(formatSummary(output.documentId, output.summary));
	}
	console.log("");
}

console.log(`Documents segmented: ${result.documentsProcessed}`);
console.log(`Duration: ${result.durationMs}ms`);

if (result.failures.length > 0) {
	console.log("");
	console.log("Failures:");
	for (const failure of result.failures) {
		console.log(`  [x] ${failure.documentId}: ${failure.error}`);
	}
	await log.destroy();
	process.exit(1);
}

await log.destroy();
