/**
 * Node Classifier Tests
 */

import { describe, expect, test } from "vitest";
import { DEFAULT_CONFIG, resolveConfig } from "../config.js";
import type { ClassificationCandidate, ClassificationContext } from "../types.js";
import { CLASSIFICATION_RULES, type ClassificationRule, classify, isTitleCased } from "./index.js";

// ============================================
// Test Fixtures
// ============================================

const candidate = (text: string, overrides: Partial<ClassificationCandidate> = {}): ClassificationCandidate => ({
	tag: "div",
	attributes: {},
	text,
	childCount: 0,
	emphasized: false,
	...overrides,
});

/** Middle of three siblings: no leading-position signal */
const middle: ClassificationContext = { ancestorTags: ["body"], siblingIndex: 1, siblingCount: 3 };
const first: ClassificationContext = { ancestorTags: ["body"], siblingIndex: 0, siblingCount: 3 };

// ============================================
// Section Titles
// ============================================

describe("classify: section titles", () => {
	test("heading tags score 0.95", () => {
		const result = classify(candidate("Item 1.01", { tag: "h2" }), middle);
		expect(result).toEqual({ type: "SECTION_TITLE", confidence: 0.95 });
	});

	test("empty heading tag is dropped", () => {
		expect(classify(candidate("", { tag: "h3" }), middle)).toBeNull();
	});

	test("emphasized short title-cased line is a heuristic heading", () => {
		const result = classify(
			candidate("Results of Operations and Financial Condition", { emphasized: true }),
			middle,
		);
		expect(result?.type).toBe("SECTION_TITLE");
		// short + title-cased = 2 of 4 signals
		expect(result?.confidence).toBeCloseTo(0.7, 5);
	});

	test("item header needs no emphasis", () => {
		const result = classify(candidate("Item 1.01 Entry into a Material Definitive Agreement"), first);
		expect(result?.type).toBe("SECTION_TITLE");
		// short + item header + leading = 3 of 4 signals
		expect(result?.confidence).toBeCloseTo(0.75, 5);
	});

	test("every heading signal gives the maximum heuristic confidence", () => {
		const result = classify(
			candidate("Item 2.02 Results of Operations and Financial Condition", { emphasized: true }),
			first,
		);
		expect(result?.confidence).toBeCloseTo(0.8, 5);
	});

	test("emphasis inherited from an enclosing bold tag counts", () => {
		const context: ClassificationContext = { ancestorTags: ["body", "b"], siblingIndex: 1, siblingCount: 3 };
		const result = classify(candidate("Signatures"), context);
		expect(result?.type).toBe("SECTION_TITLE");
		expect(result?.confidence).toBeCloseTo(0.7, 5);
	});

	test("terminal punctuation rules out a heuristic heading", () => {
		const result = classify(candidate("Item 1.01 Entry.", { emphasized: true }), middle);
		expect(result).toEqual({ type: "TEXT", confidence: 0.5 });
	});

	test("multi-line text is not a heuristic heading", () => {
		const result = classify(candidate("Item 1.01\nEntry", { emphasized: true }), middle);
		expect(result?.type).toBe("TEXT");
	});

	test("length threshold comes from configuration", () => {
		const config = resolveConfig({ headings: { maxLength: 10 } });
		const result = classify(candidate("Results of Operations", { emphasized: true }), middle, config);
		expect(result?.type).toBe("TEXT");
	});
});

// ============================================
// Paragraphs, Supplementary Text, Containers, Text
// ============================================

describe("classify: body text", () => {
	test("long punctuated run is a paragraph", () => {
		const result = classify(candidate("The Registrant entered into an agreement."), middle);
		expect(result).toEqual({ type: "PARAGRAPH", confidence: 0.9 });
	});

	test("closing quotes after the sentence end still make a paragraph", () => {
		const result = classify(candidate('The agreement is referred to as the "Credit Agreement."'), middle);
		expect(result?.type).toBe("PARAGRAPH");
	});

	test("short punctuated text is not a paragraph", () => {
		const result = classify(candidate("See above."), middle);
		expect(result).toEqual({ type: "TEXT", confidence: 0.5 });
	});

	test("footnote markers make supplementary text", () => {
		expect(classify(candidate("* Includes amounts attributable to minority holders"), middle)).toEqual({
			type: "SUPPLEMENTARY_TEXT",
			confidence: 0.7,
		});
		expect(classify(candidate("Note: amounts in thousands"), middle)?.type).toBe("SUPPLEMENTARY_TEXT");
		expect(classify(candidate("see accompanying notes"), middle)?.type).toBe("SUPPLEMENTARY_TEXT");
	});

	test("bracketed text is supplementary", () => {
		expect(classify(candidate("(Unaudited)"), middle)?.type).toBe("SUPPLEMENTARY_TEXT");
		expect(classify(candidate("[Reserved]"), middle)?.type).toBe("SUPPLEMENTARY_TEXT");
	});

	test("a leading enumerator alone is not bracketed text", () => {
		expect(classify(candidate("(d) Exhibits"), middle)?.type).toBe("TEXT");
	});

	test("node without text but with children is a container", () => {
		expect(classify(candidate("", { childCount: 2 }), middle)).toEqual({ type: "CONTAINER", confidence: 0.5 });
	});

	test("remaining text falls back to TEXT", () => {
		expect(classify(candidate("Delaware"), middle)).toEqual({ type: "TEXT", confidence: 0.5 });
	});

	test("empty node without children is dropped", () => {
		expect(classify(candidate(""), middle)).toBeNull();
	});
});

// ============================================
// Rule Order
// ============================================

describe("classify: rule order", () => {
	test("section title wins over supplementary text", () => {
		const result = classify(candidate("(Unaudited)", { emphasized: true }), middle);
		expect(result?.type).toBe("SECTION_TITLE");
		// short only = 1 of 4 signals
		expect(result?.confidence).toBeCloseTo(0.65, 5);
	});

	test("paragraph wins over supplementary text", () => {
		const result = classify(candidate("Note: all amounts are presented in thousands of dollars."), middle);
		expect(result?.type).toBe("PARAGRAPH");
	});

	test("new rules can be inserted without touching control flow", () => {
		const signatureRule: ClassificationRule = {
			name: "signature-block",
			type: "SECTION_TITLE",
			matches: (node) => node.text === "SIGNATURE",
			confidence: () => 0.99,
		};
		const rules = [signatureRule, ...CLASSIFICATION_RULES];

		expect(classify(candidate("SIGNATURE"), middle, DEFAULT_CONFIG, rules)).toEqual({
			type: "SECTION_TITLE",
			confidence: 0.99,
		});
		expect(classify(candidate("SIGNATURE"), middle)?.type).toBe("TEXT");
	});

	test("confidence always stays within [0, 1]", () => {
		const samples = [
			candidate("Item 1.01", { tag: "h1" }),
			candidate("Item 1.01", { emphasized: true }),
			candidate("A very ordinary sentence that ends properly."),
			candidate("(Unaudited)"),
			candidate("", { childCount: 4 }),
			candidate("x"),
		];
		for (const sample of samples) {
			const result = classify(sample, first);
			expect(result).not.toBeNull();
			expect(result?.confidence).toBeGreaterThanOrEqual(0);
			expect(result?.confidence).toBeLessThanOrEqual(1);
		}
	});
});

describe("isTitleCased", () => {
	test("accepts title case with minor words", () => {
		expect(isTitleCased("Results of Operations and Financial Condition")).toBe(true);
	});

	test("accepts all caps", () => {
		expect(isTitleCased("SIGNATURES")).toBe(true);
	});

	test("rejects sentence case", () => {
		expect(isTitleCased("Other events")).toBe(false);
	});

	test("rejects text without words", () => {
		expect(isTitleCased("1.01")).toBe(false);
	});
});
