/**
 * HTML Markup Parser
 *
 * Turns raw filing HTML into the markup tree the segmenter consumes, using
 * cheerio. Encoding detection and malformed-tag recovery happen here, never
 * in the segmentation engine.
 */

import * as cheerio from "cheerio";
import { type AnyNode, isTag, isText } from "domhandler";
import type { MarkupElement, MarkupNode } from "../types.js";

/** First HTML document inside an EDGAR submission text file */
const HTML_START = /<html[\s>]/i;
const HTML_END = /<\/html\s*>/i;
const ANY_TAG = /<[a-z!/][^>]*>/i;

/**
 * Pull the HTML document out of raw filing content.
 *
 * Full EDGAR submissions (`.txt`) wrap each document in SGML headers; the
 * primary document is the first `<HTML>` block. Content without an `<html>`
 * tag starts at its first tag, and content with no tags is returned as is.
 *
 * @example
 * ```typescript
 * extractHtmlContent("<SEC-HEADER>...</SEC-HEADER><TEXT><HTML><body>x</body></HTML></TEXT>");
 * // "<HTML><body>x</body></HTML>"
 * ```
 */
export function extractHtmlContent(filingContent: string): string {
	const start = HTML_START.exec(filingContent);
	if (start) {
		const rest = filingContent.slice(start.index);
		const end = HTML_END.exec(rest);
		return end ? rest.slice(0, end.index + end[0].length) : rest;
	}

	const firstTag = ANY_TAG.exec(filingContent);
	if (firstTag) {
		return filingContent.slice(firstTag.index);
	}

	return filingContent;
}

/**
 * Convert one domhandler node. Comments, directives and CDATA yield null.
 */
export function toMarkupNode(node: AnyNode): MarkupNode | null {
	if (isText(node)) {
		return { kind: "text", text: node.data };
	}
	if (isTag(node)) {
		return {
			kind: "element",
			tag: node.name.toLowerCase(),
			attributes: { ...node.attribs },
			children: toMarkupChildren(node.children),
		};
	}
	return null;
}

function toMarkupChildren(nodes: readonly AnyNode[]): MarkupNode[] {
	const children: MarkupNode[] = [];
	for (const node of nodes) {
		const converted = toMarkupNode(node);
		if (converted) {
			children.push(converted);
		}
	}
	return children;
}

/**
 * Parse filing HTML into a markup tree rooted at `<body>`.
 *
 * Loads in forgiving mode; documents the parser cannot give a body fall
 * back to a synthetic `#document` root holding every top-level node.
 *
 * @example
 * ```typescript
 * const root = parseHtml("<h2>Item 1.01</h2><p>The Registrant entered into an agreement.</p>");
 * const tree = segment(root);
 * ```
 */
export function parseHtml(html: string): MarkupElement {
	const $ = cheerio.load(html, { xml: false });

	const body = $("body").get(0);
	if (body) {
		return {
			kind: "element",
			tag: "body",
			attributes: { ...body.attribs },
			children: toMarkupChildren(body.children),
		};
	}

	return {
		kind: "element",
		tag: "#document",
		attributes: {},
		children: toMarkupChildren($.root().contents().toArray()),
	};
}
