/**
 * Document Summary
 *
 * Quick statistics over a semantic tree: element counts, section titles and
 * the opening paragraphs.
 */

import { walkTree } from "./nodes.js";
import { type SemanticNode, type SemanticType, SemanticTypeSchema, type UnscoredNode } from "./types.js";

/** Paragraph previews longer than this are cut and end with "..." */
const PREVIEW_LENGTH = 200;

export type ElementCounts = Partial<Record<SemanticType, number>>;

export interface DocumentSummary {
	counts: ElementCounts;
	sectionTitles: string[];
	leadingParagraphs: string[];
}

export interface SummaryOptions {
	/** Number of paragraph previews (default: 3) */
	paragraphs?: number;
}

/**
 * Count nodes of each type, the root included.
 */
export function countElements(root: UnscoredNode): ElementCounts {
	const counts: ElementCounts = {};
	for (const node of walkTree(root)) {
		counts[node.type] = (counts[node.type] ?? 0) + 1;
	}
	return counts;
}

/**
 * Section title texts in document order.
 */
export function collectSectionTitles(root: UnscoredNode): string[] {
	const titles: string[] = [];
	for (const node of walkTree(root)) {
		if (node.type === "SECTION_TITLE") {
			titles.push(node.content);
		}
	}
	return titles;
}

function preview(text: string): string {
	return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

/**
 * Summarize a segmented document.
 *
 * @example
 * ```typescript
 * const summary = summarizeDocument(segment(parseHtml(html)));
 * console.log(summary.counts.SECTION_TITLE, summary.sectionTitles);
 * ```
 */
export function summarizeDocument(root: SemanticNode, options: SummaryOptions = {}): DocumentSummary {
	const limit = options.paragraphs ?? 3;
	const leadingParagraphs: string[] = [];

	for (const node of walkTree(root)) {
		if (leadingParagraphs.length >= limit) {
			break;
		}
		if (node.type === "PARAGRAPH" && node.content.length > 0) {
			leadingParagraphs.push(preview(node.content));
		}
	}

	return {
		counts: countElements(root),
		sectionTitles: collectSectionTitles(root),
		leadingParagraphs,
	};
}

/**
 * Plain-text rendering of a summary for the console. Counts follow the
 * declaration order of the semantic types; absent types are left out.
 */
export function formatSummary(documentId: string, summary: DocumentSummary): string {
	const lines = [`=== ${documentId} ===`, "Element counts:"];
	for (const type of SemanticTypeSchema.options) {
		const count = summary.counts[type];
		if (count) {
			lines.push(`  ${type}: ${count}`);
		}
	}

	lines.push("Section titles:");
	for (const title of summary.sectionTitles) {
		lines.push(`  - ${title}`);
	}

	lines.push("Leading paragraphs:");
	summary.leadingParagraphs.forEach((paragraph, index) => {
		lines.push(`  ${index + 1}. ${paragraph}`);
	});

	return lines.join("\n");
}
