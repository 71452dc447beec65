/**
 * xml-cursor
 *
 * An incremental, forgiving markup reader with a callback dispatcher, a
 * tree builder, and the four structural XPath axes over the resulting tree.
 *
 * Quick start
 * ───────────
 * ```ts
 * import { createReader, parse, rootElement, following } from 'xml-cursor';
 *
 * const reader = createReader('<a><b/></a>');
 * while (reader.read()) console.log(reader.depth, reader.nodeType, reader.name?.qualified);
 * // 1 element a
 * // 2 element b
 * // 0 end-element a
 *
 * const doc = parse('<a><b/><c/></a>');
 * const [b] = rootElement(doc)?.children ?? [];
 * // b !== undefined → [...following(b)] is [<c/>]
 * ```
 */

// Reader
export { PushReader, createReader } from './reader.ts';
export type { ReaderNode, ReaderNodeType, ReaderOptions, ParseErrorHandler } from './reader.ts';

// Recognizers
export { characterData, elementStart, elementEnd, comment, cdata, processingInstruction, doctype, decodeReferences, qualifiedName } from './grammar.ts';
export type {
	Recognizer,
	Recognition,
	Success,
	Failure,
	QualifiedName,
	AttributeToken,
	ElementStartToken,
	ElementEndToken,
	ValueToken,
	ProcessingInstructionToken,
} from './grammar.ts';

// Dispatcher
export { Dispatcher, createDispatcher, events } from './dispatcher.ts';
export type {
	ReaderEvent,
	EventHandlers,
	DispatcherOptions,
	StartDocumentEvent,
	EndDocumentEvent,
	StartElementEvent,
	EndElementEvent,
	TextEvent,
	ProcessingInstructionEvent,
	DoctypeEvent,
	CommentEvent,
	ParseErrorEvent,
} from './dispatcher.ts';

// Tree
export { parse } from './builder.ts';
export type { ParseOptions } from './builder.ts';
export type {
	NodeType,
	Node,
	TreeNode,
	ParentNode,
	ChildNode,
	Document,
	Element,
	Attribute,
	Text,
	CData,
	Comment,
	ProcessingInstruction,
	DocumentType,
} from './types.ts';
export { isDocument, isElement, isAttribute, isText, isCData, isComment, isProcessingInstruction, isDocumentType } from './types.ts';

// Axes
export { Axis, ancestors, descendants, following, preceding, root, compareDocumentOrder, sortInDocumentOrder } from './axis.ts';

// Tree-query helpers
export { textContent, rootElement, childElements, child, attr } from './query.ts';

// Errors and logging
export { ParseError, AxisError, lineAndColumn } from './errors.ts';
export { ConsoleLogger, silentLogger } from './logger.ts';
export type { Logger } from './logger.ts';
