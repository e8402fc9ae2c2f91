/**
 * Classification Rules
 *
 * Ordered (predicate, type, confidence) table. The first matching rule wins,
 * so the order doubles as the tie-break order:
 * SECTION_TITLE > PARAGRAPH > SUPPLEMENTARY_TEXT > CONTAINER > TEXT.
 * New heuristics are added by inserting a rule, not by branching.
 */

import type { SegmenterConfig } from "../config.js";
import { HEADING_TAGS } from "../markup/tags.js";
import { hasEmphasizedAncestor } from "../markup/text.js";
import type { ClassificationCandidate, ClassificationContext, SemanticType } from "../types.js";

// ============================================
// Confidence Weights
// ============================================

export const HEADING_TAG_CONFIDENCE = 0.95;
export const PARAGRAPH_CONFIDENCE = 0.9;
export const SUPPLEMENTARY_CONFIDENCE = 0.7;
export const CONTAINER_CONFIDENCE = 0.5;
export const TEXT_CONFIDENCE = 0.5;

// ============================================
// Text Patterns
// ============================================

/** Headings never end like a sentence or a clause */
const TERMINAL_PUNCTUATION = /[.!?:;,]$/;

/** Sentence end, allowing closing quotes and brackets after it */
const SENTENCE_END = /[.!?:;]["'”’)\]]*$/;

/** 8-K item header, e.g. "Item 1.01" or "ITEM 9.01" */
export const ITEM_HEADER_PATTERN = /^item\s+\d{1,2}\.\d{2}\b/i;

const BRACKETED = /^(\(.*\)|\[.*\])$/s;

const MINOR_WORDS: ReadonlySet<string> = new Set([
	"a",
	"an",
	"and",
	"as",
	"at",
	"by",
	"for",
	"in",
	"of",
	"on",
	"or",
	"the",
	"to",
	"with",
]);

// ============================================
// Rule Type
// ============================================

export interface ClassificationRule {
	name: string;
	type: SemanticType;
	matches(candidate: ClassificationCandidate, context: ClassificationContext, config: SegmenterConfig): boolean;
	confidence(candidate: ClassificationCandidate, context: ClassificationContext, config: SegmenterConfig): number;
}

// ============================================
// Heading Heuristics
// ============================================

/**
 * Every significant word starts with a capital letter. All-caps counts.
 */
export function isTitleCased(text: string): boolean {
	const words = text.split(/\s+/).filter((word) => /^[\p{L}]/u.test(word));
	if (words.length === 0) {
		return false;
	}
	return words.every((word, index) => {
		if (index > 0 && MINOR_WORDS.has(word.toLowerCase())) {
			return true;
		}
		const first = word.charAt(0);
		return first === first.toUpperCase() && first !== first.toLowerCase();
	});
}

export function looksLikeHeading(
	candidate: ClassificationCandidate,
	context: ClassificationContext,
	config: SegmenterConfig,
): boolean {
	const { text } = candidate;
	if (text.length === 0 || text.includes("\n") || text.length > config.headings.maxLength) {
		return false;
	}
	if (TERMINAL_PUNCTUATION.test(text)) {
		return false;
	}
	return candidate.emphasized || hasEmphasizedAncestor(context.ancestorTags) || ITEM_HEADER_PATTERN.test(text);
}

/**
 * Scale heuristic heading confidence by how many heading signals the text
 * shows: short, title-cased, an item header, and leading its siblings.
 */
export function headingConfidence(
	candidate: ClassificationCandidate,
	context: ClassificationContext,
	config: SegmenterConfig,
): number {
	const { minConfidence, maxConfidence, shortLength } = config.headings;
	const signals = [
		candidate.text.length <= shortLength,
		isTitleCased(candidate.text),
		ITEM_HEADER_PATTERN.test(candidate.text),
		context.siblingIndex === 0 && context.siblingCount > 1,
	];
	const hits = signals.filter(Boolean).length;
	const score = minConfidence + ((maxConfidence - minConfidence) * hits) / signals.length;
	return Math.round(score * 100) / 100;
}

// ============================================
// Supplementary Text
// ============================================

export function isSupplementary(candidate: ClassificationCandidate, config: SegmenterConfig): boolean {
	const text = candidate.text;
	if (text.length === 0) {
		return false;
	}
	const lower = text.toLowerCase();
	if (config.supplementary.prefixes.some((prefix) => lower.startsWith(prefix.toLowerCase()))) {
		return true;
	}
	return text.length <= config.supplementary.maxLength && BRACKETED.test(text);
}

// ============================================
// Rule Table
// ============================================

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
	{
		name: "heading-tag",
		type: "SECTION_TITLE",
		matches: (candidate) => HEADING_TAGS.has(candidate.tag) && candidate.text.length > 0,
		confidence: () => HEADING_TAG_CONFIDENCE,
	},
	{
		name: "heading-heuristic",
		type: "SECTION_TITLE",
		matches: looksLikeHeading,
		confidence: headingConfidence,
	},
	{
		name: "paragraph",
		type: "PARAGRAPH",
		matches: (candidate, _context, config) =>
			candidate.text.length >= config.paragraph.minLength && SENTENCE_END.test(candidate.text),
		confidence: () => PARAGRAPH_CONFIDENCE,
	},
	{
		name: "supplementary",
		type: "SUPPLEMENTARY_TEXT",
		matches: (candidate, _context, config) => isSupplementary(candidate, config),
		confidence: () => SUPPLEMENTARY_CONFIDENCE,
	},
	{
		name: "container",
		type: "CONTAINER",
		matches: (candidate) => candidate.text.length === 0 && candidate.childCount > 0,
		confidence: () => CONTAINER_CONFIDENCE,
	},
	{
		name: "text",
		type: "TEXT",
		matches: (candidate) => candidate.text.length > 0,
		confidence: () => TEXT_CONFIDENCE,
	},
];
