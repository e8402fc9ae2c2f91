/**
 * Segmenter Types
 *
 * Semantic tree, markup input model and the two serialized JSON shapes.
 */

import { z } from "zod";

// ============================================
// Semantic Types
// ============================================

/**
 * Fixed vocabulary of semantic element types.
 */
export const SemanticTypeSchema = z.enum([
	"DOCUMENT",
	"SECTION_TITLE",
	"PARAGRAPH",
	"TABLE",
	"TABLE_ROW",
	"TABLE_CELL",
	"LIST",
	"LIST_ITEM",
	"TEXT",
	"SUPPLEMENTARY_TEXT",
	"CONTAINER",
]);
export type SemanticType = z.infer<typeof SemanticTypeSchema>;

/**
 * A classified content unit. Built once per document and never mutated.
 */
export interface SemanticNode {
	readonly type: SemanticType;
	/** Own text, whitespace-collapsed; empty for structural types */
	readonly content: string;
	/** Depth in the tree, 0 for the DOCUMENT root */
	readonly level: number;
	/** Certainty of the classification in [0, 1] */
	readonly confidence: number;
	readonly children: readonly SemanticNode[];
}

/**
 * A semantic node without a confidence score, as rebuilt from the LLM shape.
 */
export interface UnscoredNode {
	readonly type: SemanticType;
	readonly content: string;
	readonly level: number;
	readonly children: readonly UnscoredNode[];
}

// ============================================
// Markup Input Types
// ============================================

/**
 * Element of a parsed markup tree. Tag names are lower-case.
 */
export interface MarkupElement {
	kind: "element";
	tag: string;
	attributes: Record<string, string>;
	children: MarkupNode[];
}

/**
 * Text run of a parsed markup tree.
 */
export interface MarkupText {
	kind: "text";
	text: string;
}

export type MarkupNode = MarkupElement | MarkupText;

// ============================================
// Classification Types
// ============================================

/**
 * What the classifier sees of one markup node. Features are computed from the
 * node and at most one level of its children.
 */
export interface ClassificationCandidate {
	tag: string;
	attributes: Record<string, string>;
	/** Own text; line breaks mark `<br>` boundaries */
	text: string;
	/** Number of block children and phrasing runs that will be visited */
	childCount: number;
	/** Bold, italic or underlined, by tag, inline style or enclosing tag */
	emphasized: boolean;
}

/**
 * Shallow position of a candidate within the markup tree.
 */
export interface ClassificationContext {
	/** Markup tags from the root down to the candidate's parent */
	ancestorTags: readonly string[];
	siblingIndex: number;
	siblingCount: number;
}

export interface Classification {
	type: SemanticType;
	confidence: number;
}

// ============================================
// Builder Result Types
// ============================================

export type SegmentationIssueCode = "EMPTY_DOCUMENT" | "CYCLE_DETECTED";

/**
 * Recoverable input irregularity noticed while building the tree.
 */
export interface SegmentationIssue {
	code: SegmentationIssueCode;
	message: string;
	/** Tag of the offending markup node, if any */
	tag?: string;
}

export interface SegmentationResult {
	document: SemanticNode;
	issues: SegmentationIssue[];
}

// ============================================
// Serialized Shapes
// ============================================

/**
 * Verbose, human-readable JSON shape.
 */
export interface HumanNode {
	type: SemanticType;
	content: string;
	level: number;
	confidence: number;
	children: HumanNode[];
}

export const HumanNodeSchema: z.ZodType<HumanNode> = z.lazy(() =>
	z.object({
		type: SemanticTypeSchema,
		content: z.string(),
		level: z.number().int().nonnegative(),
		confidence: z.number().min(0).max(1),
		children: z.array(HumanNodeSchema),
	}),
);

/**
 * Compact JSON shape for machine consumption. Carries no confidence.
 */
export interface LLMNode {
	t: SemanticType;
	c: string;
	l: number;
	ch: LLMNode[];
}

export const LLMNodeSchema: z.ZodType<LLMNode> = z.lazy(() =>
	z
		.object({
			t: SemanticTypeSchema,
			c: z.string(),
			l: z.number().int().nonnegative(),
			ch: z.array(LLMNodeSchema),
		})
		.strict(),
);
