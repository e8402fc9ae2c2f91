/**
 * Semantic node construction helpers.
 */

import type { SemanticNode, SemanticType } from "./types.js";

/** Confidence of classifications read straight off unambiguous tags */
export const STRUCTURAL_CONFIDENCE = 1.0;

export function createNode(
	type: SemanticType,
	content: string,
	level: number,
	confidence: number,
	children: readonly SemanticNode[] = [],
): SemanticNode {
	return { type, content, level, confidence, children };
}

/**
 * Copy a subtree so that its root sits at `level`, shifting every
 * descendant by the same amount. Returns the node itself when it is
 * already there.
 */
export function relevel(node: SemanticNode, level: number): SemanticNode {
	if (node.level === level) {
		return node;
	}
	return {
		...node,
		level,
		children: node.children.map((child) => relevel(child, level + 1)),
	};
}

/**
 * Append children to an existing node, returning a new node.
 */
export function withChildren(node: SemanticNode, extra: readonly SemanticNode[]): SemanticNode {
	return { ...node, children: [...node.children, ...extra] };
}

/**
 * Depth-first pre-order walk.
 */
export function* walkTree<T extends { readonly children: readonly T[] }>(node: T): Generator<T> {
	yield node;
	for (const child of node.children) {
		yield* walkTree(child);
	}
}
