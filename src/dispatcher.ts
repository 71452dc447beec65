/**
 * xml-cursor — Event dispatcher
 *
 * Drives a `PushReader` over a whole input and turns its nodes into a flat
 * stream of `ReaderEvent`s, a tagged union with one variant per callback.
 * `events()` hands the stream out as a generator; `Dispatcher` feeds it to a
 * set of optional handlers.
 *
 * Stream shape
 * ─────────────
 * • `start-document` first and `end-document` last, always.
 * • A self-closing element yields `start-element` immediately followed by a
 *   synthetic `end-element` with the same name.
 * • CDATA sections arrive as `text` events with `cdata: true`.
 * • `parse-error` events are yielded in position order, before the event of
 *   the node the reader resynchronized on.
 */

import type { AttributeToken, QualifiedName } from './grammar.ts';
import type { Logger } from './logger.ts';
import { PushReader, type ReaderNode } from './reader.ts';

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface StartDocumentEvent {
	readonly type: 'start-document';
}

export interface EndDocumentEvent {
	readonly type: 'end-document';
}

export interface StartElementEvent {
	readonly type: 'start-element';
	readonly name: QualifiedName;
	readonly attributes: ReadonlyArray<AttributeToken>;
	readonly selfClosing: boolean;
	/** Nesting depth with this element open (1 for the root element). */
	readonly depth: number;
}

export interface EndElementEvent {
	readonly type: 'end-element';
	readonly name: QualifiedName;
	/** Nesting depth after this element closed. */
	readonly depth: number;
}

export interface TextEvent {
	readonly type: 'text';
	readonly value: string;
	/** `true` when the text came from a CDATA section. */
	readonly cdata: boolean;
}

export interface ProcessingInstructionEvent {
	readonly type: 'processing-instruction';
	readonly target: string;
	readonly value: string;
}

export interface DoctypeEvent {
	readonly type: 'doctype';
	readonly value: string;
}

export interface CommentEvent {
	readonly type: 'comment';
	readonly value: string;
}

export interface ParseErrorEvent {
	readonly type: 'parse-error';
	/** Offset of the skipped code unit. */
	readonly position: number;
}

export type ReaderEvent =
	| StartDocumentEvent
	| EndDocumentEvent
	| StartElementEvent
	| EndElementEvent
	| TextEvent
	| ProcessingInstructionEvent
	| DoctypeEvent
	| CommentEvent
	| ParseErrorEvent;

/** Optional callbacks, one per event variant. */
export interface EventHandlers {
	onStartDocument?(event: StartDocumentEvent): void;
	onEndDocument?(event: EndDocumentEvent): void;
	onStartElement?(event: StartElementEvent): void;
	onEndElement?(event: EndElementEvent): void;
	onText?(event: TextEvent): void;
	onProcessingInstruction?(event: ProcessingInstructionEvent): void;
	onDoctype?(event: DoctypeEvent): void;
	onComment?(event: CommentEvent): void;
	onParseError?(event: ParseErrorEvent): void;
}

export interface DispatcherOptions {
	/**
	 * Drop whitespace-only text and trim the rest. Off by default so that
	 * handlers see character data exactly as written.
	 * @default false
	 */
	ignoreWhitespace?: boolean;
	logger?: Logger;
}

// ---------------------------------------------------------------------------
// Event stream
// ---------------------------------------------------------------------------

function nodeEvents(node: ReaderNode, depth: number): ReaderEvent[] {
	switch (node.type) {
		case 'element': {
			const start: StartElementEvent = { type: 'start-element', name: node.name, attributes: node.attributes, selfClosing: node.selfClosing, depth };
			if (!node.selfClosing) return [start];
			return [start, { type: 'end-element', name: node.name, depth: depth - 1 }];
		}
		case 'end-element':
			return [{ type: 'end-element', name: node.name, depth }];
		case 'text':
			return [{ type: 'text', value: node.value, cdata: false }];
		case 'cdata':
			return [{ type: 'text', value: node.value, cdata: true }];
		case 'comment':
			return [{ type: 'comment', value: node.value }];
		case 'processing-instruction':
			return [{ type: 'processing-instruction', target: node.target, value: node.value }];
		case 'doctype':
			return [{ type: 'doctype', value: node.value }];
		default: {
			const unreachable: never = node;
			throw new Error(`Unhandled reader node ${JSON.stringify(unreachable)}`);
		}
	}
}

/** Lazily parses `input` into its event stream. */
export function* events(input: string, options: DispatcherOptions = {}): Generator<ReaderEvent, void, undefined> {
	const skipped: number[] = [];
	const reader = new PushReader(input, {
		ignoreWhitespace: options.ignoreWhitespace ?? false,
		logger: options.logger,
		onParseError: (position) => {
			skipped.push(position);
		},
	});

	yield { type: 'start-document' };
	for (;;) {
		const more = reader.read();
		for (const position of skipped) yield { type: 'parse-error', position };
		skipped.length = 0;

		const node = reader.node;
		if (!more || node === null) break;
		yield* nodeEvents(node, reader.depth);
	}
	yield { type: 'end-document' };
}

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

/**
 * Calls the matching handler for every event of a parse. Handlers that are
 * not provided are skipped.
 *
 * ```ts
 * const names: string[] = [];
 * new Dispatcher({ onStartElement: (e) => names.push(e.name.qualified) }).dispatch('<a><b/></a>');
 * // names → ['a', 'b']
 * ```
 */
export class Dispatcher {
	readonly handlers: Readonly<EventHandlers>;
	readonly options: Readonly<DispatcherOptions>;

	constructor(handlers: EventHandlers = {}, options: DispatcherOptions = {}) {
		this.handlers = handlers;
		this.options = options;
	}

	dispatch(input: string): void {
		for (const event of events(input, this.options)) this.emit(event);
	}

	private emit(event: ReaderEvent): void {
		const h = this.handlers;
		switch (event.type) {
			case 'start-document':
				h.onStartDocument?.(event);
				break;
			case 'end-document':
				h.onEndDocument?.(event);
				break;
			case 'start-element':
				h.onStartElement?.(event);
				break;
			case 'end-element':
				h.onEndElement?.(event);
				break;
			case 'text':
				h.onText?.(event);
				break;
			case 'processing-instruction':
				h.onProcessingInstruction?.(event);
				break;
			case 'doctype':
				h.onDoctype?.(event);
				break;
			case 'comment':
				h.onComment?.(event);
				break;
			case 'parse-error':
				h.onParseError?.(event);
				break;
			default: {
				const unreachable: never = event;
				throw new Error(`Unhandled event ${JSON.stringify(unreachable)}`);
			}
		}
	}
}

/** Builds a dispatcher from its handlers. */
export function createDispatcher(handlers: EventHandlers = {}, options: DispatcherOptions = {}): Dispatcher {
	return new Dispatcher(handlers, options);
}
