/**
 * Tests for the tree-query helpers.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { attr, child, childElements, parse, rootElement, textContent } from '../src/index.ts';
import { attributeAt, elementAt, labels } from './helpers.ts';

const doc = parse('<book><title lang="en" price="12.00">XML</title><!-- note --><description/></book>');

describe('textContent', () => {
	it('concatenates text below an element in document order', () => {
		const p = parse('<p>Hello <b>world</b><![CDATA[!]]><!-- x --></p>', { ignoreWhitespace: false });
		assert.equal(textContent(p), 'Hello world!');
	});

	it('returns the value of leaf nodes and attributes', () => {
		const book = rootElement(doc);
		assert.ok(book !== undefined);
		const title = elementAt(book, 0);
		assert.equal(textContent(title), 'XML');
		assert.equal(textContent(attributeAt(title, 0)), 'en');
		assert.equal(textContent(book.children[1]), ' note ');
	});

	it('returns "" for null and undefined', () => {
		assert.equal(textContent(null), '');
		assert.equal(textContent(undefined), '');
	});
});

describe('element helpers', () => {
	it('finds the root element', () => {
		assert.equal(rootElement(doc)?.name, 'book');
		assert.equal(rootElement(parse('<!-- only a comment -->')), undefined);
		assert.equal(rootElement(null), undefined);
	});

	it('lists child elements, skipping other node kinds', () => {
		assert.deepEqual(labels(childElements(rootElement(doc))), ['title', 'description']);
		assert.deepEqual(childElements(undefined), []);
	});

	it('finds a child by qualified name', () => {
		assert.equal(child(rootElement(doc), 'description')?.name, 'description');
		assert.equal(child(rootElement(doc), 'missing'), undefined);
		assert.equal(child(doc, 'book'), rootElement(doc));
	});

	it('reads attribute values', () => {
		const title = child(rootElement(doc), 'title');
		assert.equal(attr(title, 'price'), '12.00');
		assert.equal(attr(title, 'missing'), undefined);
		assert.equal(attr(null, 'price'), undefined);
	});
});
