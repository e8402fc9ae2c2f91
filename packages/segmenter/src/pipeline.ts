/**
 * Filing Segmentation Pipeline
 *
 * Raw filing content → markup tree → semantic tree → both JSON shapes.
 */

import { type BuildOptions, buildHierarchy } from "./hierarchy/index.js";
import { extractHtmlContent, parseHtml } from "./parsers/html.js";
import { toHuman, toLLM } from "./serializer.js";
import type { HumanNode, LLMNode, SegmentationIssue, SemanticNode } from "./types.js";

export interface SegmentedFiling {
	document: SemanticNode;
	issues: SegmentationIssue[];
	human: HumanNode;
	llm: LLMNode;
}

/**
 * Segment one filing, given as HTML or as a full EDGAR submission text.
 *
 * @throws SerializationError if the built tree violates an invariant
 *
 * @example
 * ```typescript
 * const { human, llm } = segmentFiling(await readFile("0001193125-24-012345.htm", "utf-8"));
 * ```
 */
export function segmentFiling(content: string, options: BuildOptions = {}): SegmentedFiling {
	const markup = parseHtml(extractHtmlContent(content));
	const { document, issues } = buildHierarchy(markup, options);
	return {
		document,
		issues,
		human: toHuman(document),
		llm: toLLM(document),
	};
}
