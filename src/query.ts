/**
 * xml-cursor — Tree-query helpers
 *
 * Small read-only accessors over a parsed tree. Names are matched against
 * the qualified name as written (`dc:title`), since the tree does not
 * resolve namespaces. A `null` or `undefined` argument returns the neutral
 * value for that function (`""`, `undefined`, `[]`).
 */

import { descendants } from './axis.ts';
import { isElement, isText, isCData } from './types.ts';
import type { Document, Element, TreeNode } from './types.ts';

/**
 * Concatenated text content of a node, like the DOM's `textContent`.
 *
 * - `Element` / `Document` → every descendant Text and CData value, in
 *   document order.
 * - `Attribute` and the leaf kinds → their own value.
 */
export function textContent(node: TreeNode | null | undefined): string {
	if (node == null) return '';
	switch (node.type) {
		case 'element':
		case 'document': {
			const parts: string[] = [];
			for (const item of descendants(node)) {
				if (isText(item) || isCData(item)) parts.push(item.value);
			}
			return parts.join('');
		}
		default:
			return node.value;
	}
}

/** The first element child of a `Document`, or `undefined` if there is none. */
export function rootElement(doc: Document | null | undefined): Element | undefined {
	return doc?.children.find(isElement);
}

/** All direct child elements of `el`. */
export function childElements(el: Element | Document | null | undefined): Element[] {
	return el == null ? [] : el.children.filter(isElement);
}

/** First direct child element named `name`. */
export function child(el: Element | Document | null | undefined, name: string): Element | undefined {
	return childElements(el).find((c) => c.name === name);
}

/** The value of the attribute named `name`, or `undefined`. */
export function attr(el: Element | null | undefined, name: string): string | undefined {
	return el?.attributes.find((a) => a.name === name)?.value;
}
