/**
 * List Decomposer
 *
 * Produces LIST → LIST_ITEM from `<ul>`/`<ol>` subtrees, with nested lists
 * as LIST children of their item.
 */

import { TraversalGuard } from "../markup/guard.js";
import { IGNORED_TAGS, LIST_TAGS } from "../markup/tags.js";
import { collapseWhitespace, flattenText } from "../markup/text.js";
import { createNode, STRUCTURAL_CONFIDENCE, withChildren } from "../nodes.js";
import type { MarkupElement, MarkupNode, SemanticNode } from "../types.js";

/** Items synthesized from stray markup directly under a list */
export const STRAY_ITEM_CONFIDENCE = 0.8;

/**
 * Outermost lists below an element, not descending into them.
 */
function nestedLists(element: MarkupElement, guard: TraversalGuard): MarkupElement[] {
	const lists: MarkupElement[] = [];
	const seen = new Set<MarkupNode>();

	const walk = (node: MarkupNode): void => {
		if (node.kind !== "element" || seen.has(node) || IGNORED_TAGS.has(node.tag)) {
			return;
		}
		seen.add(node);
		if (LIST_TAGS.has(node.tag)) {
			if (guard.enter(node)) {
				lists.push(node);
			}
			return;
		}
		for (const child of node.children) {
			walk(child);
		}
	};

	for (const child of element.children) {
		walk(child);
	}
	return lists;
}

function decomposeItem(
	element: MarkupElement,
	level: number,
	confidence: number,
	guard: TraversalGuard,
): SemanticNode {
	const content = flattenText(element.children, { exclude: LIST_TAGS });
	const sublists = nestedLists(element, guard).map((list) => decomposeList(list, level + 1, guard));
	return createNode("LIST_ITEM", content, level, confidence, sublists);
}

/**
 * Decompose a `<ul>` or `<ol>` element.
 *
 * Mixed markup is resolved locally:
 * - a list directly inside a list attaches to the preceding item, or to a
 *   new empty item when none precedes it
 * - stray text or elements directly inside a list become items scored
 *   {@link STRAY_ITEM_CONFIDENCE}
 *
 * @example
 * ```typescript
 * decomposeList(ulElement, 1);
 * // LIST → [LIST_ITEM("One"), LIST_ITEM("Two") → LIST → LIST_ITEM("Nested")]
 * ```
 */
export function decomposeList(
	list: MarkupElement,
	level: number,
	guard: TraversalGuard = new TraversalGuard(),
): SemanticNode {
	const itemLevel = level + 1;
	const items: SemanticNode[] = [];

	for (const child of list.children) {
		if (child.kind === "text") {
			const text = collapseWhitespace(child.text);
			if (text && guard.enter(child)) {
				items.push(createNode("LIST_ITEM", text, itemLevel, STRAY_ITEM_CONFIDENCE));
			}
			continue;
		}
		if (IGNORED_TAGS.has(child.tag) || !guard.enter(child)) {
			continue;
		}

		if (child.tag === "li") {
			items.push(decomposeItem(child, itemLevel, STRUCTURAL_CONFIDENCE, guard));
			continue;
		}

		if (LIST_TAGS.has(child.tag)) {
			const sublist = decomposeList(child, itemLevel + 1, guard);
			const previous = items.pop();
			items.push(
				previous
					? withChildren(previous, [sublist])
					: createNode("LIST_ITEM", "", itemLevel, STRAY_ITEM_CONFIDENCE, [sublist]),
			);
			continue;
		}

		const stray = decomposeItem(child, itemLevel, STRAY_ITEM_CONFIDENCE, guard);
		if (stray.content || stray.children.length > 0) {
			items.push(stray);
		}
	}

	return createNode("LIST", "", level, STRUCTURAL_CONFIDENCE, items);
}
