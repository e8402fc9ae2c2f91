/**
 * Hierarchy Builder
 *
 * Drives a single depth-first pass over a markup tree, routing tables and
 * lists to the decomposers and everything else through the classifier, and
 * assembles one DOCUMENT-rooted semantic tree.
 */

import type { Logger } from "pino";
import { CLASSIFICATION_RULES, type ClassificationRule, classify } from "../classifier/index.js";
import { DEFAULT_CONFIG, type SegmenterConfig } from "../config.js";
import { decomposeList, decomposeTable } from "../decomposers/index.js";
import { log } from "../logger.js";
import { TraversalGuard } from "../markup/guard.js";
import {
	HEADING_TAGS,
	IGNORED_TAGS,
	isBlankText,
	isPhrasing,
	isTag,
	LIST_TAGS,
	TRANSPARENT_ROOT_TAGS,
} from "../markup/tags.js";
import { flattenText, isEmphasizedElement, isEmphasizedRun } from "../markup/text.js";
import { createNode, relevel, STRUCTURAL_CONFIDENCE } from "../nodes.js";
import type {
	ClassificationContext,
	MarkupElement,
	MarkupNode,
	SegmentationIssue,
	SegmentationResult,
	SemanticNode,
} from "../types.js";

// ============================================
// Types
// ============================================

export interface BuildOptions {
	config?: SegmenterConfig;
	/** Classification rules in priority order (default: CLASSIFICATION_RULES) */
	rules?: readonly ClassificationRule[];
	logger?: Logger;
	/** Identifier included in log lines */
	documentId?: string;
}

/**
 * Consecutive phrasing content (text and inline elements) between blocks.
 */
interface PhrasingRun {
	kind: "run";
	nodes: MarkupNode[];
	text: string;
}

interface BlockChild {
	kind: "block";
	element: MarkupElement;
}

type Segment = PhrasingRun | BlockChild;

/**
 * A built node plus whether it came from a phrasing run. Only run-built
 * TEXT nodes merge with their neighbours.
 */
interface Built {
	node: SemanticNode;
	fromRun: boolean;
}

// ============================================
// Builder
// ============================================

/**
 * One-shot builder. Holds the state of a single traversal; create a new
 * instance per document.
 */
class HierarchyBuilder {
	private readonly guard = new TraversalGuard();

	constructor(
		private readonly config: SegmenterConfig,
		private readonly rules: readonly ClassificationRule[],
	) {}

	build(root: MarkupNode): SegmentationResult {
		const { nodes, ancestorTags } = this.unwrapRoot(root);
		const segments = this.split(nodes);
		const children = this.buildSegments(segments, 1, ancestorTags).map((built) => built.node);

		const issues: SegmentationIssue[] = this.guard.revisitedTags.map((tag) => ({
			code: "CYCLE_DETECTED",
			message: `Markup node <${tag}> reached twice; the revisit was truncated`,
			tag,
		}));
		if (children.length === 0) {
			issues.push({ code: "EMPTY_DOCUMENT", message: "Document has no extractable content" });
		}

		return {
			document: createNode("DOCUMENT", "", 0, STRUCTURAL_CONFIDENCE, children),
			issues,
		};
	}

	/**
	 * Strip `#document`/`<html>`/`<body>` wrappers. The DOCUMENT node takes
	 * their place; anything else at the root is itself top-level content.
	 */
	private unwrapRoot(root: MarkupNode): { nodes: MarkupNode[]; ancestorTags: string[] } {
		if (root.kind === "text" || !TRANSPARENT_ROOT_TAGS.has(root.tag)) {
			return { nodes: [root], ancestorTags: [] };
		}
		this.guard.enter(root);

		const ancestorTags: string[] = [];
		let current: MarkupElement = root;
		for (;;) {
			ancestorTags.push(current.tag);
			const meaningful = current.children.filter(
				(child) => !isBlankText(child) && !isTag(child, IGNORED_TAGS),
			);
			const only = meaningful.length === 1 ? meaningful[0] : undefined;
			if (!only || !isTag(only, TRANSPARENT_ROOT_TAGS)) {
				break;
			}
			if (!this.guard.enter(only)) {
				return { nodes: [], ancestorTags };
			}
			current = only;
		}

		return { nodes: current.children, ancestorTags };
	}

	/**
	 * Split sibling markup into phrasing runs and block children. Runs with
	 * no visible text are dropped here.
	 */
	private split(nodes: readonly MarkupNode[]): Segment[] {
		const segments: Segment[] = [];
		let run: MarkupNode[] = [];

		const flush = (): void => {
			if (run.length === 0) {
				return;
			}
			const text = flattenText(run);
			if (text) {
				segments.push({ kind: "run", nodes: run, text });
			}
			run = [];
		};

		for (const node of nodes) {
			if (!this.guard.enter(node)) {
				continue;
			}
			if (isPhrasing(node)) {
				run.push(node);
				continue;
			}
			flush();
			if (node.kind === "element") {
				segments.push({ kind: "block", element: node });
			}
		}
		flush();

		return segments;
	}

	private buildSegments(segments: readonly Segment[], level: number, ancestorTags: readonly string[]): Built[] {
		const built: Built[] = [];

		segments.forEach((segment, siblingIndex) => {
			const context: ClassificationContext = {
				ancestorTags,
				siblingIndex,
				siblingCount: segments.length,
			};
			const node =
				segment.kind === "run"
					? this.buildRun(segment, level, context)
					: this.visitElement(segment.element, level, context);
			if (node) {
				built.push({ node, fromRun: segment.kind === "run" });
			}
		});

		return mergeTextRuns(built, level);
	}

	private buildRun(run: PhrasingRun, level: number, context: ClassificationContext): SemanticNode | null {
		const visible = run.nodes.filter((node) => !isBlankText(node));
		const lone = visible.length === 1 ? visible[0] : undefined;
		const element = lone?.kind === "element" ? lone : undefined;

		const classification = classify(
			{
				tag: element?.tag ?? "#text",
				attributes: element?.attributes ?? {},
				text: run.text,
				childCount: 0,
				emphasized: isEmphasizedRun(run.nodes) || (element !== undefined && isEmphasizedRun(element.children)),
			},
			context,
			this.config,
			this.rules,
		);
		if (!classification) {
			return null;
		}
		return createNode(classification.type, run.text, level, classification.confidence);
	}

	private visitElement(element: MarkupElement, level: number, context: ClassificationContext): SemanticNode | null {
		if (IGNORED_TAGS.has(element.tag)) {
			return null;
		}
		if (element.tag === "table") {
			return decomposeTable(element, level, this.guard);
		}
		if (LIST_TAGS.has(element.tag)) {
			return decomposeList(element, level, this.guard);
		}

		const emphasized = isEmphasizedElement(element) || isEmphasizedRun(element.children);

		// Headings and block-free elements are leaves classified on their own text
		if (HEADING_TAGS.has(element.tag) || element.children.every(isPhrasing)) {
			const text = flattenText(element.children);
			const classification = classify(
				{ tag: element.tag, attributes: element.attributes, text, childCount: 0, emphasized },
				context,
				this.config,
				this.rules,
			);
			if (!classification) {
				return null;
			}
			return createNode(classification.type, text, level, classification.confidence);
		}

		const segments = this.split(element.children);
		const classification = classify(
			{ tag: element.tag, attributes: element.attributes, text: "", childCount: segments.length, emphasized },
			context,
			this.config,
			this.rules,
		);
		if (!classification) {
			return null;
		}

		const children = this.buildSegments(segments, level + 1, [...context.ancestorTags, element.tag]);
		if (children.length === 0) {
			return null;
		}

		// Elide single-child wrappers; the child takes the wrapper's level
		const [only] = children;
		if (classification.type === "CONTAINER" && children.length === 1 && only) {
			return relevel(only.node, level);
		}

		return createNode(
			classification.type,
			"",
			level,
			classification.confidence,
			children.map((child) => child.node),
		);
	}
}

/**
 * Merge adjacent TEXT leaves built from phrasing runs, such as the halves of
 * a sentence split by an element that produced no node.
 */
function mergeTextRuns(built: readonly Built[], level: number): Built[] {
	const merged: Built[] = [];

	for (const item of built) {
		const previous = merged[merged.length - 1];
		if (previous && isMergeableText(previous) && isMergeableText(item)) {
			merged[merged.length - 1] = {
				node: createNode(
					"TEXT",
					`${previous.node.content} ${item.node.content}`,
					level,
					Math.min(previous.node.confidence, item.node.confidence),
				),
				fromRun: true,
			};
			continue;
		}
		merged.push(item);
	}

	return merged;
}

function isMergeableText(built: Built): boolean {
	return built.fromRun && built.node.type === "TEXT" && built.node.children.length === 0;
}

// ============================================
// Entry Points
// ============================================

/**
 * Build the semantic tree of one document and report input irregularities.
 *
 * Never throws on bad input: an empty document yields a DOCUMENT without
 * children, and a cyclic markup tree is truncated at the first revisit.
 *
 * @example
 * ```typescript
 * const { document, issues } = buildHierarchy(parseHtml(html), { documentId: "0000320193-24-000100" });
 * ```
 */
export function buildHierarchy(root: MarkupNode, options: BuildOptions = {}): SegmentationResult {
	const logger = options.logger ?? log;
	const result = new HierarchyBuilder(
		options.config ?? DEFAULT_CONFIG,
		options.rules ?? CLASSIFICATION_RULES,
	).build(root);

	const cycles = result.issues.filter((issue) => issue.code === "CYCLE_DETECTED");
	if (cycles.length > 0) {
		logger.warn(
			{ documentId: options.documentId, revisits: cycles.length },
			"Cyclic markup tree truncated during segmentation",
		);
	}
	if (result.document.children.length === 0) {
		logger.debug({ documentId: options.documentId }, "Document has no extractable content");
	}

	return result;
}

/**
 * Segment a markup tree into its DOCUMENT-rooted semantic tree.
 */
export function segment(root: MarkupNode, options: BuildOptions = {}): SemanticNode {
	return buildHierarchy(root, options).document;
}
