/**
 * @form8k/segmenter
 *
 * Semantic segmentation of Form 8-K filings into a typed, leveled tree.
 *
 * Pipeline stages:
 * 1. Parse: filing HTML → markup tree (cheerio)
 * 2. Segment: markup tree → semantic tree (classifier + table/list decomposers)
 * 3. Serialize: semantic tree → Human JSON and LLM JSON
 *
 * @example
 * ```typescript
 * import { parseHtml, segment, toHuman, toLLM } from "@form8k/segmenter";
 *
 * const tree = segment(parseHtml(html));
 * const human = toHuman(tree);
 * const compact = toLLM(tree);
 * ```
 */

// Batch driver
export {
	type BatchFailure,
	type BatchOptions,
	type BatchOutput,
	type BatchProgressCallback,
	type BatchResult,
	HUMAN_OUTPUT_DIR,
	LLM_OUTPUT_DIR,
	processDocuments,
} from "./batch.js";
// Classifier
export {
	CLASSIFICATION_RULES,
	type ClassificationRule,
	classify,
	CONTAINER_CONFIDENCE,
	HEADING_TAG_CONFIDENCE,
	PARAGRAPH_CONFIDENCE,
	SUPPLEMENTARY_CONFIDENCE,
	TEXT_CONFIDENCE,
} from "./classifier/index.js";
// Configuration
export {
	DEFAULT_CONFIG,
	loadSegmenterConfig,
	resolveConfig,
	type SegmenterConfig,
	type SegmenterConfigInput,
	SegmenterConfigSchema,
} from "./config.js";
// Decomposers
export { decomposeList, decomposeTable, STRAY_ITEM_CONFIDENCE } from "./decomposers/index.js";
// Errors
export { ConfigError, SerializationError } from "./errors.js";
// Hierarchy builder
export { type BuildOptions, buildHierarchy, segment } from "./hierarchy/index.js";
// Markup
export { TraversalGuard } from "./markup/guard.js";
export { STRUCTURAL_CONFIDENCE } from "./nodes.js";
export { extractHtmlContent, parseHtml, toMarkupNode } from "./parsers/html.js";
// Pipeline
export { type SegmentedFiling, segmentFiling } from "./pipeline.js";
// Serializer
export {
	fromHuman,
	fromLLM,
	serializeHuman,
	serializeLLM,
	toHuman,
	toLLM,
	validateTree,
} from "./serializer.js";
// Summary
export {
	collectSectionTitles,
	countElements,
	type DocumentSummary,
	type ElementCounts,
	formatSummary,
	summarizeDocument,
	type SummaryOptions,
} from "./summary.js";

// Types
export type {
	Classification,
	ClassificationCandidate,
	ClassificationContext,
	HumanNode,
	LLMNode,
	MarkupElement,
	MarkupNode,
	MarkupText,
	SegmentationIssue,
	SegmentationIssueCode,
	SegmentationResult,
	SemanticNode,
	SemanticType,
	UnscoredNode,
} from "./types.js";

// Zod schemas
export { HumanNodeSchema, LLMNodeSchema, SemanticTypeSchema } from "./types.js";
