/**
 * Table Decomposer
 *
 * Produces a strict TABLE → TABLE_ROW → TABLE_CELL shape from a `<table>`
 * subtree. Table identity is structural, so every node scores 1.0.
 */

import { TraversalGuard } from "../markup/guard.js";
import { CELL_TAGS, ROW_GROUP_TAGS } from "../markup/tags.js";
import { descendantText } from "../markup/text.js";
import { createNode, STRUCTURAL_CONFIDENCE } from "../nodes.js";
import type { MarkupElement, SemanticNode } from "../types.js";

/**
 * Rows of a table in document order: direct `<tr>` children and the rows
 * of `<thead>`/`<tbody>`/`<tfoot>` groups. Rows of nested tables belong to
 * their own table and are not collected.
 */
function collectRows(table: MarkupElement, guard: TraversalGuard): MarkupElement[] {
	const rows: MarkupElement[] = [];

	const takeRow = (node: MarkupElement): void => {
		if (guard.enter(node)) {
			rows.push(node);
		}
	};

	for (const child of table.children) {
		if (child.kind !== "element") {
			continue;
		}
		if (child.tag === "tr") {
			takeRow(child);
		} else if (ROW_GROUP_TAGS.has(child.tag) && guard.enter(child)) {
			for (const grandchild of child.children) {
				if (grandchild.kind === "element" && grandchild.tag === "tr") {
					takeRow(grandchild);
				}
			}
		}
	}

	return rows;
}

function decomposeRow(row: MarkupElement, level: number, guard: TraversalGuard): SemanticNode {
	const cells: SemanticNode[] = [];
	for (const child of row.children) {
		if (child.kind === "element" && CELL_TAGS.has(child.tag) && guard.enter(child)) {
			cells.push(createNode("TABLE_CELL", descendantText(child), level + 1, STRUCTURAL_CONFIDENCE));
		}
	}
	// A row without cells is kept: empty rows act as visual separators
	return createNode("TABLE_ROW", "", level, STRUCTURAL_CONFIDENCE, cells);
}

/**
 * Decompose a `<table>` element.
 *
 * Ragged rows stay ragged; no cells are padded or merged.
 *
 * @example
 * ```typescript
 * decomposeTable(tableElement, 1);
 * // TABLE(l=1) → TABLE_ROW(l=2) → [TABLE_CELL("A", l=3), TABLE_CELL("B", l=3)]
 * ```
 */
export function decomposeTable(
	table: MarkupElement,
	level: number,
	guard: TraversalGuard = new TraversalGuard(),
): SemanticNode {
	const rows = collectRows(table, guard).map((row) => decomposeRow(row, level + 1, guard));
	return createNode("TABLE", "", level, STRUCTURAL_CONFIDENCE, rows);
}
