/**
 * HTML tag vocabulary used by the builder and decomposers.
 */

import type { MarkupElement, MarkupNode } from "../types.js";

/** Elements that never produce semantic nodes */
export const IGNORED_TAGS: ReadonlySet<string> = new Set([
	"script",
	"style",
	"head",
	"title",
	"meta",
	"link",
	"noscript",
	"template",
]);

/** Root wrappers the DOCUMENT node stands in for */
export const TRANSPARENT_ROOT_TAGS: ReadonlySet<string> = new Set(["#document", "html", "body"]);

export const HEADING_TAGS: ReadonlySet<string> = new Set(["h1", "h2", "h3", "h4", "h5", "h6"]);

export const LIST_TAGS: ReadonlySet<string> = new Set(["ul", "ol"]);

export const ROW_GROUP_TAGS: ReadonlySet<string> = new Set(["thead", "tbody", "tfoot"]);

export const CELL_TAGS: ReadonlySet<string> = new Set(["td", "th"]);

/** Phrasing elements: flattened into the surrounding text unless they wrap a block */
export const INLINE_TAGS: ReadonlySet<string> = new Set([
	"a",
	"abbr",
	"b",
	"bdi",
	"bdo",
	"big",
	"br",
	"cite",
	"code",
	"data",
	"del",
	"dfn",
	"em",
	"font",
	"i",
	"img",
	"ins",
	"kbd",
	"label",
	"mark",
	"q",
	"s",
	"samp",
	"small",
	"span",
	"strike",
	"strong",
	"sub",
	"sup",
	"time",
	"tt",
	"u",
	"var",
	"wbr",
]);

/** Tags that emphasize everything inside them */
export const EMPHASIS_TAGS: ReadonlySet<string> = new Set(["b", "strong", "em", "i", "u"]);

export function isTag(node: MarkupNode, tags: ReadonlySet<string>): node is MarkupElement {
	return node.kind === "element" && tags.has(node.tag);
}

export function isBlankText(node: MarkupNode): boolean {
	return node.kind === "text" && node.text.trim().length === 0;
}

/**
 * Whether an inline element wraps block content somewhere below it.
 * SEC filings routinely put `<div>`s inside `<font>` and `<span>`.
 */
export function containsBlock(element: MarkupElement, seen: Set<MarkupNode> = new Set()): boolean {
	for (const child of element.children) {
		if (child.kind !== "element" || IGNORED_TAGS.has(child.tag) || seen.has(child)) {
			continue;
		}
		seen.add(child);
		if (!INLINE_TAGS.has(child.tag) || containsBlock(child, seen)) {
			return true;
		}
	}
	return false;
}

/**
 * Phrasing content: text, or an inline element with no block inside.
 */
export function isPhrasing(node: MarkupNode): boolean {
	if (node.kind === "text") {
		return true;
	}
	if (IGNORED_TAGS.has(node.tag)) {
		return true;
	}
	return INLINE_TAGS.has(node.tag) && !containsBlock(node);
}
