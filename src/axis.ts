/**
 * xml-cursor — Axis navigation
 *
 * The four structural XPath axes over a parsed tree, plus document-order
 * comparison.
 *
 * Document order is a depth-first, left-to-right walk in which an element's
 * attributes come right after the element, in declaration order, and before
 * its first child. Put differently: the "contents" of an element are its
 * attributes followed by its children, and two nodes are siblings when they
 * share a parent, whether they are attributes or children.
 *
 * For a node `n` and any other node `m` of the same tree, `m` lies on
 * exactly one of `ancestors(n)`, `descendants(n)`, `preceding(n)` and
 * `following(n)`.
 *
 * Every axis is lazy and restartable: each `for…of` starts a fresh walk over
 * the current tree. Walks keep their own explicit stack, so tree depth is not
 * bounded by the call stack.
 */

import { AxisError } from './errors.ts';
import type { ParentNode, TreeNode } from './types.ts';

// ---------------------------------------------------------------------------
// Axis
// ---------------------------------------------------------------------------

/** A lazily evaluated, restartable sequence of nodes. */
export class Axis<T extends TreeNode = TreeNode> implements Iterable<T> {
	private readonly walk: () => Iterator<T>;

	constructor(walk: () => Iterator<T>) {
		this.walk = walk;
	}

	[Symbol.iterator](): Iterator<T> {
		return this.walk();
	}

	/** Materializes the axis. */
	toArray(): T[] {
		return Array.from(this);
	}

	/** First node on the axis, or `undefined` when it is empty. */
	first(): T | undefined {
		const step = this.walk().next();
		return step.done ? undefined : step.value;
	}
}

// ---------------------------------------------------------------------------
// Internal walks
// ---------------------------------------------------------------------------

/** Attributes then children of an element, children of a document, nothing otherwise. */
function contents(node: TreeNode): ReadonlyArray<TreeNode> {
	switch (node.type) {
		case 'element':
			return node.attributes.length === 0 ? node.children : [...node.attributes, ...node.children];
		case 'document':
			return node.children;
		default:
			return [];
	}
}

function pushReversed(stack: TreeNode[], nodes: ReadonlyArray<TreeNode>): void {
	for (let i = nodes.length - 1; i >= 0; i--) {
		const node = nodes[i];
		if (node !== undefined) stack.push(node);
	}
}

function* walkAncestors(node: TreeNode): Generator<ParentNode, void, undefined> {
	for (let parent = node.parent; parent !== null; parent = parent.parent) yield parent;
}

function* walkDescendants(node: TreeNode): Generator<TreeNode, void, undefined> {
	const stack: TreeNode[] = [];
	pushReversed(stack, contents(node));
	for (let next = stack.pop(); next !== undefined; next = stack.pop()) {
		yield next;
		pushReversed(stack, contents(next));
	}
}

/** `node`, then its later siblings with their subtrees, then the same for each ancestor outward. */
function* walkFollowing(node: TreeNode): Generator<TreeNode, void, undefined> {
	let current: TreeNode = node;
	for (let parent = current.parent; parent !== null; current = parent, parent = parent.parent) {
		const siblings = contents(parent);
		for (let i = siblings.indexOf(current) + 1; i < siblings.length; i++) {
			const sibling = siblings[i];
			if (sibling === undefined) continue;
			yield sibling;
			yield* walkDescendants(sibling);
		}
	}
}

/** From the outermost level inward: earlier siblings of each ancestor (and of `node`) with their subtrees. */
function* walkPreceding(node: TreeNode): Generator<TreeNode, void, undefined> {
	const levels: Array<{ node: TreeNode; parent: ParentNode }> = [];
	for (let current: TreeNode = node, parent = node.parent; parent !== null; current = parent, parent = parent.parent) {
		levels.push({ node: current, parent });
	}

	for (let level = levels.length - 1; level >= 0; level--) {
		const step = levels[level];
		if (step === undefined) continue;
		const siblings = contents(step.parent);
		const index = siblings.indexOf(step.node);
		for (let i = 0; i < index; i++) {
			const sibling = siblings[i];
			if (sibling === undefined) continue;
			yield sibling;
			yield* walkDescendants(sibling);
		}
	}
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Parent, grandparent, … up to the root. Empty for the root. */
export function ancestors(node: TreeNode): Axis<ParentNode> {
	return new Axis(() => walkAncestors(node));
}

/**
 * Every node below `node` in document order, `node` excluded. Attributes
 * come right after their element.
 */
export function descendants(node: TreeNode): Axis {
	return new Axis(() => walkDescendants(node));
}

/** Every node after `node` in document order that is not one of its descendants. */
export function following(node: TreeNode): Axis {
	return new Axis(() => walkFollowing(node));
}

/** Every node before `node` in document order that is not one of its ancestors. */
export function preceding(node: TreeNode): Axis {
	return new Axis(() => walkPreceding(node));
}

/** The topmost node above `node` (`node` itself when it has no parent). */
export function root(node: TreeNode): TreeNode {
	let top: TreeNode = node;
	for (let parent = node.parent; parent !== null; parent = parent.parent) top = parent;
	return top;
}

/** `[root, …, node]` */
function pathFromRoot(node: TreeNode): TreeNode[] {
	const path: TreeNode[] = [node];
	for (let parent = node.parent; parent !== null; parent = parent.parent) path.push(parent);
	return path.reverse();
}

/**
 * Compares two nodes of the same tree by document order.
 *
 * @throws {AxisError} When the nodes do not share a root.
 */
export function compareDocumentOrder(a: TreeNode, b: TreeNode): -1 | 0 | 1 {
	if (a === b) return 0;
	const pathA = pathFromRoot(a);
	const pathB = pathFromRoot(b);
	if (pathA[0] !== pathB[0]) throw new AxisError('Cannot order nodes from different trees');

	let depth = 0;
	while (depth < pathA.length && depth < pathB.length && pathA[depth] === pathB[depth]) depth++;
	if (depth === pathA.length) return -1;
	if (depth === pathB.length) return 1;

	const parent = pathA[depth - 1];
	const branchA = pathA[depth];
	const branchB = pathB[depth];
	if (parent === undefined || branchA === undefined || branchB === undefined) {
		throw new AxisError('Inconsistent parent references');
	}
	const siblings = contents(parent);
	return siblings.indexOf(branchA) < siblings.indexOf(branchB) ? -1 : 1;
}

/** A copy of `nodes` sorted into document order. */
export function sortInDocumentOrder<T extends TreeNode>(nodes: Iterable<T>): T[] {
	return Array.from(nodes).sort(compareDocumentOrder);
}
