/**
 * xml-cursor — Tree builder
 *
 * Materializes the `PushReader` node stream as a tree of plain objects with
 * parent references, ready for the axis functions.
 *
 * Tolerance specifics
 * ────────────────────
 * • Malformed markup is skipped by the reader and leaves no trace in the tree.
 * • An end tag closes the nearest open element with the same qualified name,
 *   closing anything opened inside it on the way.
 * • An end tag that matches no open element is dropped.
 * • Elements still open at the end of input are closed implicitly.
 *
 * With `strict: true` each of these situations throws a `ParseError` instead.
 */

import { ParseError } from './errors.ts';
import type { QualifiedName } from './grammar.ts';
import { silentLogger, type Logger } from './logger.ts';
import { PushReader } from './reader.ts';
import type { Attribute, ChildNode, Document, Element, ParentNode } from './types.ts';

export interface ParseOptions {
	/**
	 * Drop whitespace-only text and trim the rest.
	 * @default true
	 */
	ignoreWhitespace?: boolean;
	/**
	 * Throw a `ParseError` on malformed markup, stray end tags and unclosed
	 * elements instead of recovering.
	 * @default false
	 */
	strict?: boolean;
	logger?: Logger;
}

interface OpenElement {
	readonly element: Element;
	readonly children: ChildNode[];
}

function names(name: QualifiedName): { name: string; prefix: string | null; localName: string } {
	return { name: name.qualified, prefix: name.prefix, localName: name.local };
}

/**
 * Parses `input` into a `Document`.
 *
 * @throws {ParseError} Only with `strict: true`.
 */
export function parse(input: string, options: ParseOptions = {}): Document {
	const strict = options.strict ?? false;
	const logger = options.logger ?? silentLogger;
	const reader = new PushReader(input, {
		ignoreWhitespace: options.ignoreWhitespace ?? true,
		logger,
		onParseError: strict
			? (position) => {
					throw ParseError.at(input, position);
				}
			: undefined,
	});

	const rootChildren: ChildNode[] = [];
	const document: Document = { type: 'document', parent: null, children: rootChildren };
	const stack: OpenElement[] = [];

	while (reader.read()) {
		const node = reader.node;
		if (node === null) break;

		const open = stack.length > 0 ? stack[stack.length - 1] : undefined;
		const parent: ParentNode = open?.element ?? document;
		const siblings = open?.children ?? rootChildren;

		switch (node.type) {
			case 'element': {
				const attributes: Attribute[] = [];
				const children: ChildNode[] = [];
				const element: Element = { type: 'element', parent, ...names(node.name), attributes, children };
				for (const attribute of node.attributes) {
					attributes.push({ type: 'attribute', parent: element, ...names(attribute.name), value: attribute.value });
				}
				siblings.push(element);
				if (!node.selfClosing) stack.push({ element, children });
				break;
			}
			case 'end-element': {
				const qualified = node.name.qualified;
				let index = stack.length - 1;
				while (index >= 0 && stack[index]?.element.name !== qualified) index--;
				if (index < 0) {
					if (strict) throw ParseError.at(input, reader.position, `Unexpected end tag </${qualified}>`);
					logger.warn('dropping unmatched end tag', { name: qualified, position: reader.position });
				} else {
					if (strict && index !== stack.length - 1) {
						throw ParseError.at(input, reader.position, `Mismatched end tag </${qualified}>`);
					}
					stack.length = index;
				}
				break;
			}
			case 'text':
			case 'cdata':
			case 'comment':
			case 'doctype':
				siblings.push({ type: node.type, parent, value: node.value });
				break;
			case 'processing-instruction':
				siblings.push({ type: 'processing-instruction', parent, target: node.target, value: node.value });
				break;
		}
	}

	if (stack.length > 0) {
		const unclosed = stack.map((open) => open.element.name);
		if (strict) throw ParseError.at(input, input.length, `Unclosed element <${unclosed[unclosed.length - 1]}>`);
		logger.debug('closing elements left open at end of input', { elements: unclosed });
	}

	return document;
}
