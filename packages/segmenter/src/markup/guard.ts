import type { MarkupNode } from "../types.js";

/**
 * Tracks markup node identity during one traversal so a cyclic tree is
 * truncated at the first revisit instead of looping.
 */
export class TraversalGuard {
	private readonly visited = new Set<MarkupNode>();
	private readonly revisits: string[] = [];

	/**
	 * Mark a node visited. Returns false if it was already visited.
	 */
	enter(node: MarkupNode): boolean {
		if (this.visited.has(node)) {
			this.revisits.push(node.kind === "element" ? node.tag : "#text");
			return false;
		}
		this.visited.add(node);
		return true;
	}

	/** Tags of the nodes reached a second time, in traversal order */
	get revisitedTags(): readonly string[] {
		return this.revisits;
	}
}
