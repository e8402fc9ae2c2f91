/**
 * Node Classifier
 *
 * Assigns a semantic type and confidence to one markup node from its own
 * features and shallow context. Tables and lists never reach it; the
 * builder routes them to the decomposers first.
 */

import { DEFAULT_CONFIG, type SegmenterConfig } from "../config.js";
import type { Classification, ClassificationCandidate, ClassificationContext } from "../types.js";
import { CLASSIFICATION_RULES, type ClassificationRule } from "./rules.js";

export {
	CLASSIFICATION_RULES,
	CONTAINER_CONFIDENCE,
	type ClassificationRule,
	HEADING_TAG_CONFIDENCE,
	headingConfidence,
	ITEM_HEADER_PATTERN,
	isSupplementary,
	isTitleCased,
	looksLikeHeading,
	PARAGRAPH_CONFIDENCE,
	SUPPLEMENTARY_CONFIDENCE,
	TEXT_CONFIDENCE,
} from "./rules.js";

/**
 * Classify a candidate node.
 *
 * @returns The first matching rule's type and confidence, or null for an
 *   empty node (no text, no children), which is dropped from the tree.
 *
 * @example
 * ```typescript
 * classify(
 *   { tag: "h2", attributes: {}, text: "Item 1.01", childCount: 1, emphasized: false },
 *   { ancestorTags: ["body"], siblingIndex: 0, siblingCount: 2 },
 * );
 * // { type: "SECTION_TITLE", confidence: 0.95 }
 * ```
 */
export function classify(
	candidate: ClassificationCandidate,
	context: ClassificationContext,
	config: SegmenterConfig = DEFAULT_CONFIG,
	rules: readonly ClassificationRule[] = CLASSIFICATION_RULES,
): Classification | null {
	if (candidate.text.length === 0 && candidate.childCount === 0) {
		return null;
	}

	for (const rule of rules) {
		if (rule.matches(candidate, context, config)) {
			return { type: rule.type, confidence: rule.confidence(candidate, context, config) };
		}
	}

	return null;
}
