/**
 * Tests for the structural axes and document-order comparison.
 *
 * The book tree used throughout:
 *
 *   #document
 *   └── book
 *       ├── title  @lang="en" @price="12.00"
 *       │   └── "XML"
 *       └── description
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parse } from '../src/builder.ts';
import { AxisError } from '../src/errors.ts';
import { ancestors, compareDocumentOrder, descendants, following, preceding, root, sortInDocumentOrder } from '../src/axis.ts';
import type { TreeNode } from '../src/types.ts';
import { attributeAt, childAt, elementAt, labels, rootElement } from './helpers.ts';

function bookTree() {
	const doc = parse('<book><title lang="en" price="12.00">XML</title><description/></book>');
	const book = rootElement(doc);
	const title = elementAt(book, 0);
	return {
		doc,
		book,
		title,
		lang: attributeAt(title, 0),
		price: attributeAt(title, 1),
		text: childAt(title, 0),
		description: elementAt(book, 1),
	};
}

// ---------------------------------------------------------------------------
// Individual axes
// ---------------------------------------------------------------------------

describe('ancestors', () => {
	const { doc, book, title, lang, price, text, description } = bookTree();

	it('walks from the parent up to the root', () => {
		assert.deepEqual(labels(ancestors(doc)), []);
		assert.deepEqual(labels(ancestors(book)), ['#document']);
		assert.deepEqual(labels(ancestors(title)), ['book', '#document']);
		assert.deepEqual(labels(ancestors(lang)), ['title', 'book', '#document']);
		assert.deepEqual(labels(ancestors(price)), ['title', 'book', '#document']);
		assert.deepEqual(labels(ancestors(text)), ['title', 'book', '#document']);
		assert.deepEqual(labels(ancestors(description)), ['book', '#document']);
	});
});

describe('descendants', () => {
	const { doc, book, title, lang, price, text, description } = bookTree();

	it('lists attributes right after their element', () => {
		assert.deepEqual(labels(descendants(doc)), ['book', 'title', '@lang', '@price', 'text:XML', 'description']);
		assert.deepEqual(labels(descendants(book)), ['title', '@lang', '@price', 'text:XML', 'description']);
		assert.deepEqual(labels(descendants(title)), ['@lang', '@price', 'text:XML']);
	});

	it('is empty for leaves and attributes', () => {
		for (const node of [lang, price, text, description]) {
			assert.deepEqual(labels(descendants(node)), []);
		}
	});
});

describe('following', () => {
	const { doc, book, title, lang, price, text, description } = bookTree();

	it('continues from the closest scope outward', () => {
		assert.deepEqual(labels(following(doc)), []);
		assert.deepEqual(labels(following(book)), []);
		assert.deepEqual(labels(following(title)), ['description']);
		assert.deepEqual(labels(following(lang)), ['@price', 'text:XML', 'description']);
		assert.deepEqual(labels(following(price)), ['text:XML', 'description']);
		assert.deepEqual(labels(following(text)), ['description']);
		assert.deepEqual(labels(following(description)), []);
	});
});

describe('preceding', () => {
	const { doc, book, title, lang, price, text, description } = bookTree();

	it('excludes ancestors and keeps document order', () => {
		assert.deepEqual(labels(preceding(doc)), []);
		assert.deepEqual(labels(preceding(book)), []);
		assert.deepEqual(labels(preceding(title)), []);
		assert.deepEqual(labels(preceding(lang)), []);
		assert.deepEqual(labels(preceding(price)), ['@lang']);
		assert.deepEqual(labels(preceding(text)), ['@lang', '@price']);
		assert.deepEqual(labels(preceding(description)), ['title', '@lang', '@price', 'text:XML']);
	});

	it('interleaves outer levels before inner ones', () => {
		const doc2 = parse('<r><a><a1/></a><b><b1/><b2><x/></b2></b></r>');
		const b = elementAt(rootElement(doc2), 1);
		const x = elementAt(elementAt(b, 1), 0);
		assert.deepEqual(labels(preceding(x)), ['a', 'a1', 'b1']);
		assert.deepEqual(labels(following(elementAt(elementAt(rootElement(doc2), 0), 0))), ['b', 'b1', 'b2', 'x']);
	});
});

// ---------------------------------------------------------------------------
// Partition and ordering
// ---------------------------------------------------------------------------

describe('axis partition', () => {
	const { doc } = bookTree();
	const all: TreeNode[] = [doc, ...descendants(doc)];

	it('puts every other node on exactly one axis', () => {
		for (const node of all) {
			const axes: TreeNode[][] = [ancestors(node).toArray(), descendants(node).toArray(), preceding(node).toArray(), following(node).toArray()];
			for (const other of all) {
				const hits = axes.filter((axis) => axis.includes(other)).length;
				assert.equal(hits, other === node ? 0 : 1, `${labels([other])[0]} relative to ${labels([node])[0]}`);
			}
		}
	});

	it('agrees with compareDocumentOrder', () => {
		for (const node of all) {
			for (const before of preceding(node)) assert.equal(compareDocumentOrder(before, node), -1);
			for (const after of following(node)) assert.equal(compareDocumentOrder(after, node), 1);
			for (const above of ancestors(node)) assert.equal(compareDocumentOrder(above, node), -1);
			for (const below of descendants(node)) assert.equal(compareDocumentOrder(below, node), 1);
		}
	});
});

describe('compareDocumentOrder', () => {
	const { doc, book, title, lang, price, text, description } = bookTree();

	it('orders attributes after their element and before its children', () => {
		assert.equal(compareDocumentOrder(lang, price), -1);
		assert.equal(compareDocumentOrder(price, lang), 1);
		assert.equal(compareDocumentOrder(title, lang), -1);
		assert.equal(compareDocumentOrder(price, text), -1);
		assert.equal(compareDocumentOrder(description, text), 1);
		assert.equal(compareDocumentOrder(book, book), 0);
	});

	it('sorts nodes into document order', () => {
		assert.deepEqual(labels(sortInDocumentOrder([description, lang, doc, text, book])), ['#document', 'book', '@lang', 'text:XML', 'description']);
	});

	it('rejects nodes from different trees', () => {
		const other = rootElement(parse('<book/>'));
		assert.throws(() => compareDocumentOrder(book, other), AxisError);
	});

	it('finds the root of any node', () => {
		assert.equal(root(lang), doc);
		assert.equal(root(doc), doc);
	});
});

// ---------------------------------------------------------------------------
// Iteration contract
// ---------------------------------------------------------------------------

describe('axis iteration', () => {
	const { book, description } = bookTree();

	it('keeps signalling exhaustion without reviving', () => {
		const iterator = ancestors(description)[Symbol.iterator]();
		assert.equal(iterator.next().value, book);
		assert.equal(iterator.next().done, false);
		for (let i = 0; i < 3; i++) assert.deepEqual(iterator.next(), { done: true, value: undefined });
	});

	it('restarts on every iteration', () => {
		const axis = descendants(book);
		assert.deepEqual(labels(axis), labels(axis));
		assert.equal(axis.toArray().length, 5);
	});

	it('evaluates lazily', () => {
		assert.equal(descendants(book).first(), elementAt(book, 0));
		assert.equal(following(description).first(), undefined);
	});

	it('handles deep trees without recursion', () => {
		const depth = 20000;
		const doc = parse('<d>'.repeat(depth) + '</d>'.repeat(depth));
		let innermost = rootElement(doc);
		for (;;) {
			const next = innermost.children[0];
			if (next === undefined || next.type !== 'element') break;
			innermost = next;
		}
		assert.equal(ancestors(innermost).toArray().length, depth);
		assert.equal(descendants(doc).toArray().length, depth);
		assert.equal(preceding(innermost).toArray().length, 0);
		assert.equal(following(rootElement(doc)).toArray().length, 0);
		assert.equal(compareDocumentOrder(rootElement(doc), innermost), -1);
	});
});
