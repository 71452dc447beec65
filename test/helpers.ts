/**
 * Test helpers: strict accessors that throw instead of returning
 * `undefined`, a reader driver and a logger that records what it is given.
 */
import { PushReader, type ReaderNodeType, type ReaderOptions } from '../src/reader.ts';
import { rootElement as _rootElement } from '../src/query.ts';
import type { Logger } from '../src/logger.ts';
import type { Attribute, ChildNode, Document, Element, TreeNode } from '../src/types.ts';

/** Returns the root element, throwing if absent. */
export function rootElement(doc: Document): Element {
	const el = _rootElement(doc);
	if (el === undefined) throw new Error('Document has no root element');
	return el;
}

/** The child at `index`, throwing if absent. */
export function childAt(parent: Element | Document, index: number): ChildNode {
	const node = parent.children[index];
	if (node === undefined) throw new Error(`No child at index ${index}`);
	return node;
}

/** The child at `index`, throwing unless it is an element. */
export function elementAt(parent: Element | Document, index: number): Element {
	const node = childAt(parent, index);
	if (node.type !== 'element') throw new Error(`Child ${index} is a ${node.type}`);
	return node;
}

/** The attribute at `index`, throwing if absent. */
export function attributeAt(el: Element, index: number): Attribute {
	const node = el.attributes[index];
	if (node === undefined) throw new Error(`No attribute at index ${index}`);
	return node;
}

/** A short readable label for a node, used to compare axis output. */
export function label(node: TreeNode): string {
	switch (node.type) {
		case 'document':
			return '#document';
		case 'element':
			return node.name;
		case 'attribute':
			return `@${node.name}`;
		case 'processing-instruction':
			return `?${node.target}`;
		default:
			return `${node.type}:${node.value}`;
	}
}

export function labels(nodes: Iterable<TreeNode>): string[] {
	return Array.from(nodes, label);
}

export interface Step {
	type: ReaderNodeType | null;
	name: string | null;
	value: string | null;
	depth: number;
	selfClosing: boolean;
}

/** Reads `input` to the end, recording each node the reader stops on. */
export function readAll(input: string, options?: ReaderOptions): Step[] {
	const reader = new PushReader(input, options);
	const steps: Step[] = [];
	while (reader.read()) {
		steps.push({
			type: reader.nodeType,
			name: reader.name?.qualified ?? null,
			value: reader.value,
			depth: reader.depth,
			selfClosing: reader.isSelfClosing,
		});
	}
	return steps;
}

export class RecordingLogger implements Logger {
	readonly entries: Array<{ level: string; message: string; attributes: unknown[] }> = [];

	debug(message: string, ...attributes: unknown[]): void {
		this.entries.push({ level: 'debug', message, attributes });
	}

	info(message: string, ...attributes: unknown[]): void {
		this.entries.push({ level: 'info', message, attributes });
	}

	warn(message: string, ...attributes: unknown[]): void {
		this.entries.push({ level: 'warn', message, attributes });
	}

	error(message: string, ...attributes: unknown[]): void {
		this.entries.push({ level: 'error', message, attributes });
	}
}
