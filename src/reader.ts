/**
 * xml-cursor — Push reader
 *
 * A single-step cursor over markup text, in the spirit of .NET's
 * `XmlReader`: every call to `read()` moves to the next node and exposes it
 * through the accessors. No tree is built.
 *
 * Depth bookkeeping
 * ──────────────────
 * • An `element` node increments the depth, an `end-element` node
 *   decrements it.
 * • A self-closing element (`<a/>`) increments the depth while it is the
 *   current node and gives it back on the following `read()`. It produces
 *   no `end-element` node of its own; consumers that need one synthesize it
 *   (the dispatcher does).
 *
 * Recovery
 * ─────────
 * When nothing matches before the end of input, the reader reports the
 * position through `onParseError`, skips exactly one code unit and tries
 * again. Every retry moves forward, so a parse always terminates.
 */

import {
	cdata,
	characterData,
	comment,
	doctype,
	elementEnd,
	elementStart,
	processingInstruction,
	type AttributeToken,
	type QualifiedName,
} from './grammar.ts';
import { trimXmlWhitespace } from './chars.ts';
import { silentLogger, type Logger } from './logger.ts';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

/** Kinds of node the reader can be positioned on. */
export type ReaderNodeType = 'element' | 'end-element' | 'text' | 'cdata' | 'comment' | 'processing-instruction' | 'doctype';

/** Receives the position of each malformed code unit the reader skips. */
export type ParseErrorHandler = (position: number) => void;

export interface ReaderOptions {
	/**
	 * Drop text runs made only of whitespace and trim the others.
	 * @default true
	 */
	ignoreWhitespace?: boolean;
	/** Called for each skipped position. Without it, malformed input is skipped silently. */
	onParseError?: ParseErrorHandler;
	/** Receives recovery and end-of-input diagnostics at debug level. */
	logger?: Logger;
}

/** Snapshot of the node the reader is positioned on. */
export type ReaderNode =
	| { readonly type: 'element'; readonly name: QualifiedName; readonly attributes: ReadonlyArray<AttributeToken>; readonly selfClosing: boolean }
	| { readonly type: 'end-element'; readonly name: QualifiedName }
	| { readonly type: 'text'; readonly value: string }
	| { readonly type: 'cdata'; readonly value: string }
	| { readonly type: 'comment'; readonly value: string }
	| { readonly type: 'doctype'; readonly value: string }
	| { readonly type: 'processing-instruction'; readonly target: string; readonly value: string };

const NO_ATTRIBUTES: ReadonlyArray<AttributeToken> = Object.freeze([]);

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

export class PushReader {
	readonly ignoreWhitespace: boolean;

	private readonly buffer: string;
	private readonly onParseError: ParseErrorHandler | undefined;
	private readonly logger: Logger;

	private pos = 0;
	private current: ReaderNode | null = null;
	private currentDepth = 0;
	private selfClosing = false;
	private ended = false;

	constructor(input: string, options: ReaderOptions = {}) {
		this.buffer = input;
		this.ignoreWhitespace = options.ignoreWhitespace ?? true;
		this.onParseError = options.onParseError;
		this.logger = options.logger ?? silentLogger;
	}

	// -------------------------------------------------------------------------
	// Accessors
	// -------------------------------------------------------------------------

	/** The current node, or `null` before the first read and after the end. */
	get node(): ReaderNode | null {
		return this.current;
	}

	get nodeType(): ReaderNodeType | null {
		return this.current?.type ?? null;
	}

	/** Qualified name of the current element or end-element. */
	get name(): QualifiedName | null {
		const node = this.current;
		return node?.type === 'element' || node?.type === 'end-element' ? node.name : null;
	}

	/** Text of the current text, CDATA, comment, PI or doctype node. */
	get value(): string | null {
		const node = this.current;
		if (node === null || node.type === 'element' || node.type === 'end-element') return null;
		return node.value;
	}

	/** Target of the current processing instruction. */
	get processingInstructionTarget(): string | null {
		const node = this.current;
		return node?.type === 'processing-instruction' ? node.target : null;
	}

	/** Attributes of the current element; empty for every other kind. */
	get attributes(): ReadonlyArray<AttributeToken> {
		const node = this.current;
		return node?.type === 'element' ? node.attributes : NO_ATTRIBUTES;
	}

	/** Number of elements currently open, the current one included. */
	get depth(): number {
		return this.currentDepth;
	}

	/** `true` while positioned on a self-closing element such as `<a/>`. */
	get isSelfClosing(): boolean {
		return this.selfClosing;
	}

	/** `true` once the reader has run past the end of the input. */
	get eof(): boolean {
		return this.ended;
	}

	/** Offset just past the current node. Never decreases. */
	get position(): number {
		return this.pos;
	}

	// -------------------------------------------------------------------------
	// Stepping
	// -------------------------------------------------------------------------

	/**
	 * Moves to the next node. Returns `false` at the end of input, and keeps
	 * returning `false` on every later call.
	 */
	read(): boolean {
		if (this.ended) return false;

		if (this.selfClosing) {
			this.currentDepth--;
			this.selfClosing = false;
		}
		this.current = null;

		for (;;) {
			const node = this.recognize();
			if (node === undefined) continue;
			if (node !== null) {
				if (node.type === 'element') {
					this.currentDepth++;
					this.selfClosing = node.selfClosing;
				} else if (node.type === 'end-element') {
					this.currentDepth--;
				}
				this.current = node;
				return true;
			}

			if (this.pos >= this.buffer.length) {
				this.ended = true;
				this.logger.debug('end of input', { position: this.pos, depth: this.currentDepth });
				return false;
			}

			this.logger.debug('skipping malformed markup', { position: this.pos });
			this.onParseError?.(this.pos);
			this.pos++;
		}
	}

	/** Alias of {@link read}. */
	advance(): boolean {
		return this.read();
	}

	/**
	 * Tries every recognizer in priority order at the cursor and moves past
	 * the first match. Returns `undefined` for ignored whitespace (consumed,
	 * nothing to emit) and `null` when nothing matches.
	 */
	private recognize(): ReaderNode | null | undefined {
		const { buffer, pos } = this;

		const text = characterData(buffer, pos);
		if (text.ok) {
			this.pos = text.end;
			const value = this.ignoreWhitespace ? trimXmlWhitespace(text.value) : text.value;
			return value === '' ? undefined : { type: 'text', value };
		}

		const start = elementStart(buffer, pos);
		if (start.ok) {
			this.pos = start.end;
			return { type: 'element', ...start.value };
		}

		const end = elementEnd(buffer, pos);
		if (end.ok) {
			this.pos = end.end;
			return { type: 'end-element', name: end.value.name };
		}

		const note = comment(buffer, pos);
		if (note.ok) {
			this.pos = note.end;
			return { type: 'comment', value: note.value.value };
		}

		const section = cdata(buffer, pos);
		if (section.ok) {
			this.pos = section.end;
			return { type: 'cdata', value: section.value.value };
		}

		const pi = processingInstruction(buffer, pos);
		if (pi.ok) {
			this.pos = pi.end;
			return { type: 'processing-instruction', target: pi.value.target, value: pi.value.value };
		}

		const declaration = doctype(buffer, pos);
		if (declaration.ok) {
			this.pos = declaration.end;
			return { type: 'doctype', value: declaration.value.value };
		}

		return null;
	}

	toString(): string {
		if (this.ended) return 'PushReader{EOF}';
		const label = this.name?.qualified ?? this.value ?? '-';
		return `PushReader{${this.currentDepth} ${this.nodeType ?? '-'} ${label}}`;
	}
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Creates a reader over `input`.
 *
 * @param ignoreWhitespace Drop whitespace-only text and trim the rest.
 * @param onParseError Called with the position of every skipped code unit.
 */
export function createReader(input: string, ignoreWhitespace = true, onParseError?: ParseErrorHandler): PushReader {
	return new PushReader(input, { ignoreWhitespace, onParseError });
}
