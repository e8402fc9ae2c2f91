/**
 * Table Decomposer Tests
 */

import { describe, expect, test } from "vitest";
import { TraversalGuard } from "../markup/guard.js";
import type { MarkupElement, MarkupNode, MarkupText } from "../types.js";
import { decomposeTable } from "./table.js";

// ============================================
// Test Fixtures
// ============================================

const el = (tag: string, children: MarkupNode[] = [], attributes: Record<string, string> = {}): MarkupElement => ({
	kind: "element",
	tag,
	attributes,
	children,
});

const txt = (text: string): MarkupText => ({ kind: "text", text });

const cell = (text: string, tag = "td"): MarkupElement => el(tag, [txt(text)]);

// ============================================
// Tests
// ============================================

describe("decomposeTable", () => {
	test("produces TABLE → TABLE_ROW → TABLE_CELL at consecutive levels", () => {
		const table = el("table", [el("tr", [cell("A"), cell("B")])]);

		expect(decomposeTable(table, 1)).toEqual({
			type: "TABLE",
			content: "",
			level: 1,
			confidence: 1,
			children: [
				{
					type: "TABLE_ROW",
					content: "",
					level: 2,
					confidence: 1,
					children: [
						{ type: "TABLE_CELL", content: "A", level: 3, confidence: 1, children: [] },
						{ type: "TABLE_CELL", content: "B", level: 3, confidence: 1, children: [] },
					],
				},
			],
		});
	});

	test("collects rows from header, body and footer groups in order", () => {
		const table = el("table", [
			el("thead", [el("tr", [cell("Revenue", "th"), cell("2024", "th")])]),
			el("tbody", [el("tr", [cell("Product"), cell("$100M")])]),
			el("tfoot", [el("tr", [cell("Total"), cell("$100M")])]),
		]);

		const result = decomposeTable(table, 1);

		expect(result.children.map((row) => row.children.map((c) => c.content))).toEqual([
			["Revenue", "2024"],
			["Product", "$100M"],
			["Total", "$100M"],
		]);
	});

	test("keeps empty rows", () => {
		const table = el("table", [el("tr", [cell("A")]), el("tr"), el("tr", [cell("B")])]);

		const result = decomposeTable(table, 1);

		expect(result.children).toHaveLength(3);
		expect(result.children[1]?.children).toEqual([]);
	});

	test("keeps ragged rows ragged", () => {
		const table = el("table", [el("tr", [cell("1"), cell("2"), cell("3")]), el("tr", [cell("only")])]);

		const result = decomposeTable(table, 1);

		expect(result.children.map((row) => row.children.length)).toEqual([3, 1]);
	});

	test("flattens cell markup into trimmed pieces joined by spaces", () => {
		const table = el("table", [
			el("tr", [el("td", [el("b", [txt("Total")]), txt("  revenue\n "), el("span", [txt("$ 1,200")])])]),
		]);

		const result = decomposeTable(table, 1);

		expect(result.children[0]?.children[0]?.content).toBe("Total revenue $ 1,200");
	});

	test("an empty cell is kept with empty content", () => {
		const table = el("table", [el("tr", [cell("A"), el("td"), cell("C")])]);

		const result = decomposeTable(table, 1);

		expect(result.children[0]?.children.map((c) => c.content)).toEqual(["A", "", "C"]);
	});

	test("nested table text stays in its cell and its rows are not collected", () => {
		const inner = el("table", [el("tr", [cell("inner")])]);
		const table = el("table", [el("tr", [el("td", [inner])])]);

		const result = decomposeTable(table, 1);

		expect(result.children).toHaveLength(1);
		expect(result.children[0]?.children[0]?.content).toBe("inner");
	});

	test("whitespace and stray markup between rows and cells are ignored", () => {
		const table = el("table", [txt("\n  "), el("tr", [txt(" "), cell("A"), el("div", [txt("x")])]), txt("\n")]);

		const result = decomposeTable(table, 1);

		expect(result.children).toHaveLength(1);
		expect(result.children[0]?.children.map((c) => c.content)).toEqual(["A"]);
	});

	test("table without rows has no children", () => {
		expect(decomposeTable(el("table"), 2)).toEqual({
			type: "TABLE",
			content: "",
			level: 2,
			confidence: 1,
			children: [],
		});
	});

	test("a row reached twice is emitted once and reported to the guard", () => {
		const row = el("tr", [cell("A")]);
		const table = el("table", [el("tbody", [row, row])]);
		const guard = new TraversalGuard();

		const result = decomposeTable(table, 1, guard);

		expect(result.children).toHaveLength(1);
		expect(guard.revisitedTags).toEqual(["tr"]);
	});
});
