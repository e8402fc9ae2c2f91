/**
 * Text extraction from markup subtrees.
 */

import type { MarkupElement, MarkupNode } from "../types.js";
import { EMPHASIS_TAGS, IGNORED_TAGS, INLINE_TAGS } from "./tags.js";

/** Marks a `<br>` while flattening; `\s` does not match it */
const LINE_BREAK = "\u0000";

const BOLD_STYLE = /font-weight\s*:\s*(bold|bolder|[6-9]00)\b/i;
const ITALIC_STYLE = /font-style\s*:\s*italic\b/i;
const UNDERLINE_STYLE = /text-decoration(-line)?\s*:[^;]*\bunderline\b/i;

export function collapseWhitespace(text: string): string {
	return text.replace(/\s+/g, " ").trim();
}

export interface FlattenOptions {
	/** Subtrees rooted at these tags contribute no text */
	exclude?: ReadonlySet<string>;
}

/**
 * Flatten phrasing content into one string.
 *
 * Inline markup joins without separators so `Reg<b>is</b>trant` stays one
 * word; block boundaries become spaces and `<br>` becomes a line break.
 * Every line is whitespace-collapsed and blank lines are dropped.
 */
export function flattenText(nodes: readonly MarkupNode[], options: FlattenOptions = {}): string {
	const parts: string[] = [];
	const seen = new Set<MarkupNode>();

	const walk = (node: MarkupNode): void => {
		if (seen.has(node)) {
			return;
		}
		seen.add(node);

		if (node.kind === "text") {
			parts.push(node.text);
			return;
		}
		if (IGNORED_TAGS.has(node.tag)) {
			return;
		}
		if (options.exclude?.has(node.tag)) {
			parts.push(" ");
			return;
		}
		if (node.tag === "br") {
			parts.push(LINE_BREAK);
			return;
		}

		const block = !INLINE_TAGS.has(node.tag);
		if (block) {
			parts.push(" ");
		}
		for (const child of node.children) {
			walk(child);
		}
		if (block) {
			parts.push(" ");
		}
	};

	for (const node of nodes) {
		walk(node);
	}

	return parts
		.join("")
		.split(LINE_BREAK)
		.map(collapseWhitespace)
		.filter((line) => line.length > 0)
		.join("\n");
}

/**
 * Every descendant text run, trimmed and joined with single spaces.
 */
export function descendantText(element: MarkupElement): string {
	const pieces: string[] = [];
	const seen = new Set<MarkupNode>();

	const walk = (node: MarkupNode): void => {
		if (seen.has(node)) {
			return;
		}
		seen.add(node);

		if (node.kind === "text") {
			const piece = collapseWhitespace(node.text);
			if (piece) {
				pieces.push(piece);
			}
			return;
		}
		if (IGNORED_TAGS.has(node.tag)) {
			return;
		}
		for (const child of node.children) {
			walk(child);
		}
	};

	walk(element);
	return pieces.join(" ");
}

// ============================================
// Emphasis
// ============================================

export function hasEmphasisStyle(attributes: Record<string, string>): boolean {
	const style = attributes.style;
	if (!style) {
		return false;
	}
	return BOLD_STYLE.test(style) || ITALIC_STYLE.test(style) || UNDERLINE_STYLE.test(style);
}

export function isEmphasizedElement(element: MarkupElement): boolean {
	return EMPHASIS_TAGS.has(element.tag) || hasEmphasisStyle(element.attributes);
}

/**
 * Whether every visible node of a run is an emphasized element.
 * Looks at the run itself only, never below it.
 */
export function isEmphasizedRun(nodes: readonly MarkupNode[]): boolean {
	let visible = 0;
	for (const node of nodes) {
		if (node.kind === "text") {
			if (node.text.trim().length > 0) {
				return false;
			}
			continue;
		}
		if (node.tag === "br" || IGNORED_TAGS.has(node.tag)) {
			continue;
		}
		if (!isEmphasizedElement(node)) {
			return false;
		}
		visible++;
	}
	return visible > 0;
}

export function hasEmphasizedAncestor(ancestorTags: readonly string[]): boolean {
	return ancestorTags.some((tag) => EMPHASIS_TAGS.has(tag));
}
