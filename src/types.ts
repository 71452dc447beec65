/**
 * xml-cursor — Tree node model
 *
 * All node types form a discriminated union on `type`. Every node keeps a
 * non-owning `parent` reference (`null` only for the document), so any node
 * can be navigated from without a handle on the whole tree.
 *
 *   TreeNode
 *   ├── Document
 *   ├── Element
 *   ├── Attribute
 *   ├── Text
 *   ├── CData
 *   ├── Comment
 *   ├── ProcessingInstruction
 *   └── DocumentType
 *
 * Trees are built once (see `parse`) and treated as read-only afterwards.
 */

// ---------------------------------------------------------------------------
// Discriminant
// ---------------------------------------------------------------------------

/** All legal values of `node.type`. */
export type NodeType = 'document' | 'element' | 'attribute' | 'text' | 'cdata' | 'comment' | 'processing-instruction' | 'doctype';

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

/** Common root of every tree node. */
export interface Node {
	readonly type: NodeType;
	/** Owning node; `null` for the document (or a detached node). */
	readonly parent: ParentNode | null;
}

/** Shared by the named node kinds. */
interface Named {
	/** Qualified name as written, e.g. `dc:title`. */
	readonly name: string;
	/** Part before the colon, or `null` when unprefixed. */
	readonly prefix: string | null;
	/** Part after the colon (the whole name when unprefixed). */
	readonly localName: string;
}

// ---------------------------------------------------------------------------
// Concrete node types
// ---------------------------------------------------------------------------

/**
 * An attribute of an element. Attributes are nodes in their own right so
 * that the axes can position them: in document order they come right after
 * their element, before its first child.
 */
export interface Attribute extends Node, Named {
	readonly type: 'attribute';
	readonly parent: Element;
	/** Decoded value. */
	readonly value: string;
}

/** `<!DOCTYPE …>`; the body is kept verbatim. */
export interface DocumentType extends Node {
	readonly type: 'doctype';
	readonly value: string;
}

/** `<?target data?>`, including the XML declaration (target `xml`). */
export interface ProcessingInstruction extends Node {
	readonly type: 'processing-instruction';
	readonly target: string;
	readonly value: string;
}

export interface Comment extends Node {
	readonly type: 'comment';
	readonly value: string;
}

/** A CDATA section; kept apart from `Text`. */
export interface CData extends Node {
	readonly type: 'cdata';
	readonly value: string;
}

export interface Text extends Node {
	readonly type: 'text';
	/** Decoded text (entity references expanded). */
	readonly value: string;
}

export interface Element extends Node, Named {
	readonly type: 'element';
	/** Attributes in declaration order; duplicates are preserved. */
	readonly attributes: ReadonlyArray<Attribute>;
	readonly children: ReadonlyArray<ChildNode>;
}

/** The root node of a parsed tree. */
export interface Document extends Node {
	readonly type: 'document';
	readonly parent: null;
	readonly children: ReadonlyArray<ChildNode>;
}

// ---------------------------------------------------------------------------
// Union aliases used in the tree
// ---------------------------------------------------------------------------

/** Node kinds that may appear in a `children` list. */
export type ChildNode = Element | Text | CData | Comment | ProcessingInstruction | DocumentType;

/** Node kinds that own children. */
export type ParentNode = Document | Element;

/** Union of every node kind. */
export type TreeNode = Document | Element | Attribute | Text | CData | Comment | ProcessingInstruction | DocumentType;

// ---------------------------------------------------------------------------
// Type guards
// ---------------------------------------------------------------------------

export function isDocument(node: Node): node is Document {
	return node.type === 'document';
}

export function isElement(node: Node): node is Element {
	return node.type === 'element';
}

export function isAttribute(node: Node): node is Attribute {
	return node.type === 'attribute';
}

export function isText(node: Node): node is Text {
	return node.type === 'text';
}

export function isCData(node: Node): node is CData {
	return node.type === 'cdata';
}

export function isComment(node: Node): node is Comment {
	return node.type === 'comment';
}

export function isProcessingInstruction(node: Node): node is ProcessingInstruction {
	return node.type === 'processing-instruction';
}

export function isDocumentType(node: Node): node is DocumentType {
	return node.type === 'doctype';
}
