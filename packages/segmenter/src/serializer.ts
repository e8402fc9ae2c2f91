/**
 * Serializer
 *
 * Pure maps from a semantic tree to the Human and LLM JSON shapes and back.
 * Every node is checked against the tree invariants on the way out; a
 * violation is a builder bug and throws instead of being clamped.
 */

import { SerializationError } from "./errors.js";
import {
	type HumanNode,
	HumanNodeSchema,
	type LLMNode,
	LLMNodeSchema,
	type SemanticNode,
	type SemanticType,
	SemanticTypeSchema,
	type UnscoredNode,
} from "./types.js";

/** Child types a structural parent admits */
const ALLOWED_CHILDREN: Partial<Record<SemanticType, SemanticType>> = {
	TABLE: "TABLE_ROW",
	TABLE_ROW: "TABLE_CELL",
	LIST: "LIST_ITEM",
};

// ============================================
// Invariants
// ============================================

/**
 * Check one node against its parent. Throws SerializationError on the
 * first violation.
 */
function checkNode(
	node: UnscoredNode,
	path: string,
	parent: UnscoredNode | undefined,
	confidence?: number,
): void {
	if (!SemanticTypeSchema.safeParse(node.type).success) {
		throw SerializationError.invariant(path, `unknown type ${String(node.type)}`);
	}
	if (typeof node.content !== "string") {
		throw SerializationError.invariant(path, "content must be a string");
	}
	if (!Number.isInteger(node.level) || node.level < 0) {
		throw SerializationError.invariant(path, `level ${node.level} is not a non-negative integer`);
	}
	if (confidence !== undefined && !(Number.isFinite(confidence) && confidence >= 0 && confidence <= 1)) {
		throw SerializationError.invariant(path, `confidence ${confidence} is outside [0, 1]`);
	}

	if (node.type === "DOCUMENT") {
		if (parent) {
			throw SerializationError.invariant(path, "DOCUMENT must be the root");
		}
		if (node.level !== 0) {
			throw SerializationError.invariant(path, `DOCUMENT level must be 0, got ${node.level}`);
		}
		if (confidence !== undefined && confidence !== 1) {
			throw SerializationError.invariant(path, `DOCUMENT confidence must be 1, got ${confidence}`);
		}
	}

	if (parent) {
		if (node.level !== parent.level + 1) {
			throw SerializationError.invariant(
				path,
				`level ${node.level} does not follow parent level ${parent.level}`,
			);
		}
		const allowed = ALLOWED_CHILDREN[parent.type];
		if (allowed && node.type !== allowed) {
			throw SerializationError.invariant(path, `${parent.type} cannot contain ${node.type}`);
		}
	}
}

function childPath(path: string, index: number): string {
	return `${path}.children[${index}]`;
}

/**
 * Validate a whole tree without serializing it.
 *
 * @throws SerializationError on the first invariant violation
 */
export function validateTree(node: SemanticNode, path = "$", parent?: SemanticNode): void {
	checkNode(node, path, parent, node.confidence);
	node.children.forEach((child, index) => validateTree(child, childPath(path, index), node));
}

// ============================================
// Tree → JSON
// ============================================

function humanAt(node: SemanticNode, path: string, parent: SemanticNode | undefined): HumanNode {
	checkNode(node, path, parent, node.confidence);
	return {
		type: node.type,
		content: node.content,
		level: node.level,
		confidence: node.confidence,
		children: node.children.map((child, index) => humanAt(child, childPath(path, index), node)),
	};
}

function llmAt(node: SemanticNode, path: string, parent: SemanticNode | undefined): LLMNode {
	checkNode(node, path, parent, node.confidence);
	return {
		t: node.type,
		c: node.content,
		l: node.level,
		ch: node.children.map((child, index) => llmAt(child, childPath(path, index), node)),
	};
}

/**
 * Verbose shape: `{ type, content, level, confidence, children }`.
 *
 * @throws SerializationError if the tree violates an invariant
 */
export function toHuman(node: SemanticNode): HumanNode {
	return humanAt(node, "$", undefined);
}

/**
 * Compact shape: `{ t, c, l, ch }`. Confidence is left out at every depth.
 *
 * @throws SerializationError if the tree violates an invariant
 */
export function toLLM(node: SemanticNode): LLMNode {
	return llmAt(node, "$", undefined);
}

/** Human JSON text, indented two spaces */
export function serializeHuman(node: SemanticNode): string {
	return JSON.stringify(toHuman(node), null, 2);
}

/** LLM JSON text without whitespace */
export function serializeLLM(node: SemanticNode): string {
	return JSON.stringify(toLLM(node));
}

// ============================================
// JSON → Tree
// ============================================

function fromHumanAt(json: HumanNode, path: string, parent: SemanticNode | undefined): SemanticNode {
	const shell: SemanticNode = {
		type: json.type,
		content: json.content,
		level: json.level,
		confidence: json.confidence,
		children: [],
	};
	checkNode(shell, path, parent, shell.confidence);
	return {
		...shell,
		children: json.children.map((child, index) => fromHumanAt(child, childPath(path, index), shell)),
	};
}

function fromLLMAt(json: LLMNode, path: string, parent: UnscoredNode | undefined): UnscoredNode {
	const shell: UnscoredNode = { type: json.t, content: json.c, level: json.l, children: [] };
	checkNode(shell, path, parent);
	return {
		...shell,
		children: json.ch.map((child, index) => fromLLMAt(child, childPath(path, index), shell)),
	};
}

/**
 * Rebuild a semantic tree from its Human JSON form.
 *
 * @throws SerializationError if the input is not a valid Human tree
 */
export function fromHuman(json: unknown): SemanticNode {
	const parsed = HumanNodeSchema.safeParse(json);
	if (!parsed.success) {
		throw SerializationError.invalidShape("human", parsed.error.issues);
	}
	return fromHumanAt(parsed.data, "$", undefined);
}

/**
 * Rebuild a tree from its LLM JSON form. Confidence does not survive the
 * compact shape, so the result is unscored.
 *
 * @throws SerializationError if the input is not a valid LLM tree
 */
export function fromLLM(json: unknown): UnscoredNode {
	const parsed = LLMNodeSchema.safeParse(json);
	if (!parsed.success) {
		throw SerializationError.invalidShape("llm", parsed.error.issues);
	}
	return fromLLMAt(parsed.data, "$", undefined);
}
