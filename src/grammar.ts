/**
 * xml-cursor — Token recognizers
 *
 * Each recognizer looks at `buffer` starting at `position` and either
 * succeeds with a structured token and the position just past it, or fails
 * without consuming anything. Recognizers are pure: no state survives a call,
 * so the reader is free to try them in any order at any position.
 *
 * Tolerance specifics
 * ────────────────────
 * • Unknown named entity references (e.g. `&nbsp;`) are kept verbatim.
 * • A bare `&` and a reference missing its `;` are kept / decoded leniently.
 * • Attribute values may use either quote style.
 * • `<!doctype` is matched case-insensitively.
 * • Unterminated comments, CDATA sections, PIs and doctypes fail, which lets
 *   the reader resynchronize one code unit further on.
 */

import { isDecimalDigit, isHexDigit, isNameChar, isNameStartChar, isXmlWhitespace } from './chars.ts';

// ---------------------------------------------------------------------------
// Recognition results
// ---------------------------------------------------------------------------

export interface Success<T> {
	readonly ok: true;
	readonly value: T;
	/** Position just past the recognized text. */
	readonly end: number;
}

export interface Failure {
	readonly ok: false;
	/** Position the recognizer was asked to start at. */
	readonly position: number;
}

export type Recognition<T> = Success<T> | Failure;

/** A matcher over `(buffer, position)`. */
export type Recognizer<T> = (buffer: string, position: number) => Recognition<T>;

function succeed<T>(value: T, end: number): Success<T> {
	return { ok: true, value, end };
}

function fail(position: number): Failure {
	return { ok: false, position };
}

// ---------------------------------------------------------------------------
// Token shapes
// ---------------------------------------------------------------------------

/** A name as written, split on its first `:`. */
export interface QualifiedName {
	/** The full name, prefix included. */
	readonly qualified: string;
	readonly prefix: string | null;
	readonly local: string;
}

export interface AttributeToken {
	readonly name: QualifiedName;
	/** Decoded value (entity references expanded). */
	readonly value: string;
}

export interface ElementStartToken {
	readonly name: QualifiedName;
	readonly attributes: ReadonlyArray<AttributeToken>;
	/** `true` for `<name/>`, `false` for `<name>`. */
	readonly selfClosing: boolean;
}

export interface ElementEndToken {
	readonly name: QualifiedName;
}

/** Comment, CDATA and doctype bodies. */
export interface ValueToken {
	readonly value: string;
}

export interface ProcessingInstructionToken {
	readonly target: string;
	readonly value: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LT = 0x3c;
const GT = 0x3e;
const HASH = 0x23;
const SEMICOLON = 0x3b;
const EQUALS = 0x3d;

/** The five predefined XML entities. */
const PREDEFINED_ENTITIES: ReadonlyMap<string, string> = new Map([
	['amp', '&'],
	['lt', '<'],
	['gt', '>'],
	['apos', "'"],
	['quot', '"'],
]);

// ---------------------------------------------------------------------------
// Scanning helpers
// ---------------------------------------------------------------------------

function skipWhitespace(buffer: string, position: number): number {
	let pos = position;
	while (pos < buffer.length && isXmlWhitespace(buffer.charCodeAt(pos))) pos++;
	return pos;
}

/** End of the name starting at `position`, or -1 when there is none. */
function scanName(buffer: string, position: number): number {
	if (position >= buffer.length || !isNameStartChar(buffer.charCodeAt(position))) return -1;
	let pos = position + 1;
	while (pos < buffer.length && isNameChar(buffer.charCodeAt(pos))) pos++;
	return pos;
}

/** Splits a scanned name on its first `:`; a leading or trailing colon is not a prefix separator. */
export function qualifiedName(qualified: string): QualifiedName {
	const colon = qualified.indexOf(':');
	if (colon > 0 && colon < qualified.length - 1) {
		return { qualified, prefix: qualified.slice(0, colon), local: qualified.slice(colon + 1) };
	}
	return { qualified, prefix: null, local: qualified };
}

function codePointToString(code: number): string {
	if (code === 0 || code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff)) return '\ufffd';
	return String.fromCodePoint(code);
}

/** Decodes the reference starting at the `&` at `amp`. Returns the text and the position after it. */
function decodeReference(raw: string, amp: number): [string, number] {
	let pos = amp + 1;

	if (raw.charCodeAt(pos) === HASH) {
		pos++;
		const hex = raw[pos] === 'x' || raw[pos] === 'X';
		if (hex) pos++;
		const isDigit = hex ? isHexDigit : isDecimalDigit;
		const start = pos;
		while (pos < raw.length && isDigit(raw.charCodeAt(pos))) pos++;
		const digits = raw.slice(start, pos);
		if (raw.charCodeAt(pos) === SEMICOLON) pos++;
		return [digits.length > 0 ? codePointToString(parseInt(digits, hex ? 16 : 10)) : '\ufffd', pos];
	}

	const start = pos;
	while (pos < raw.length && isNameChar(raw.charCodeAt(pos))) pos++;
	const name = raw.slice(start, pos);
	if (name.length === 0) return ['&', pos];
	if (raw.charCodeAt(pos) === SEMICOLON) pos++;

	return [PREDEFINED_ENTITIES.get(name) ?? raw.slice(amp, pos), pos];
}

/** Expands entity and character references in `raw`. */
export function decodeReferences(raw: string): string {
	let amp = raw.indexOf('&');
	if (amp === -1) return raw;

	const parts: string[] = [];
	let pos = 0;
	while (amp !== -1) {
		parts.push(raw.slice(pos, amp));
		const [text, next] = decodeReference(raw, amp);
		parts.push(text);
		pos = next;
		amp = raw.indexOf('&', pos);
	}
	parts.push(raw.slice(pos));
	return parts.join('');
}

function scanQuoted(buffer: string, position: number): Success<string> | null {
	const quote = buffer[position];
	if (quote !== '"' && quote !== "'") return null;
	const close = buffer.indexOf(quote, position + 1);
	if (close === -1) return null;
	return succeed(decodeReferences(buffer.slice(position + 1, close)), close + 1);
}

function scanAttribute(buffer: string, position: number): Success<AttributeToken> | null {
	const nameEnd = scanName(buffer, position);
	if (nameEnd === -1) return null;
	let pos = skipWhitespace(buffer, nameEnd);
	if (buffer.charCodeAt(pos) !== EQUALS) return null;
	pos = skipWhitespace(buffer, pos + 1);
	const value = scanQuoted(buffer, pos);
	if (value === null) return null;
	return succeed({ name: qualifiedName(buffer.slice(position, nameEnd)), value: value.value }, value.end);
}

/** Matches `open` body `close`, yielding the body. */
function delimited(open: string, close: string): Recognizer<ValueToken> {
	return (buffer, position) => {
		if (!buffer.startsWith(open, position)) return fail(position);
		const start = position + open.length;
		const end = buffer.indexOf(close, start);
		if (end === -1) return fail(position);
		return succeed({ value: buffer.slice(start, end) }, end + close.length);
	};
}

// ---------------------------------------------------------------------------
// Recognizers
// ---------------------------------------------------------------------------

/** A run of text up to the next `<`, with references decoded. */
export const characterData: Recognizer<string> = (buffer, position) => {
	if (position >= buffer.length || buffer.charCodeAt(position) === LT) return fail(position);
	const lt = buffer.indexOf('<', position);
	const end = lt === -1 ? buffer.length : lt;
	return succeed(decodeReferences(buffer.slice(position, end)), end);
};

/** `<name attr="value" …>` or `<name …/>`. */
export const elementStart: Recognizer<ElementStartToken> = (buffer, position) => {
	if (buffer.charCodeAt(position) !== LT) return fail(position);
	const nameEnd = scanName(buffer, position + 1);
	if (nameEnd === -1) return fail(position);

	const attributes: AttributeToken[] = [];
	let pos = nameEnd;
	for (;;) {
		const next = skipWhitespace(buffer, pos);
		if (next === pos) break;
		pos = next;
		const attribute = scanAttribute(buffer, pos);
		if (attribute === null) break;
		attributes.push(attribute.value);
		pos = attribute.end;
	}

	const name = qualifiedName(buffer.slice(position + 1, nameEnd));
	if (buffer.startsWith('/>', pos)) return succeed({ name, attributes, selfClosing: true }, pos + 2);
	if (buffer.charCodeAt(pos) === GT) return succeed({ name, attributes, selfClosing: false }, pos + 1);
	return fail(position);
};

/** `</name>`, whitespace allowed before the `>`. */
export const elementEnd: Recognizer<ElementEndToken> = (buffer, position) => {
	if (!buffer.startsWith('</', position)) return fail(position);
	const nameEnd = scanName(buffer, position + 2);
	if (nameEnd === -1) return fail(position);
	const pos = skipWhitespace(buffer, nameEnd);
	if (buffer.charCodeAt(pos) !== GT) return fail(position);
	return succeed({ name: qualifiedName(buffer.slice(position + 2, nameEnd)) }, pos + 1);
};

/** `<!-- … -->` */
export const comment: Recognizer<ValueToken> = delimited('<!--', '-->');

/** `<![CDATA[ … ]]>`; the body is raw. */
export const cdata: Recognizer<ValueToken> = delimited('<![CDATA[', ']]>');

/** `<?target data?>`; the value starts after the whitespace following the target. */
export const processingInstruction: Recognizer<ProcessingInstructionToken> = (buffer, position) => {
	if (!buffer.startsWith('<?', position)) return fail(position);
	const nameEnd = scanName(buffer, position + 2);
	if (nameEnd === -1) return fail(position);
	const target = buffer.slice(position + 2, nameEnd);

	if (buffer.startsWith('?>', nameEnd)) return succeed({ target, value: '' }, nameEnd + 2);

	const start = skipWhitespace(buffer, nameEnd);
	if (start === nameEnd) return fail(position);
	const end = buffer.indexOf('?>', start);
	if (end === -1) return fail(position);
	return succeed({ target, value: buffer.slice(start, end) }, end + 2);
};

/**
 * `<!DOCTYPE body>`. The body is returned verbatim; `>` inside quotes or
 * inside the bracketed internal subset does not end it. Comments and
 * processing instructions in the subset are passed over whole, quotes
 * included.
 */
export const doctype: Recognizer<ValueToken> = (buffer, position) => {
	const keyword = '<!DOCTYPE';
	if (buffer.slice(position, position + keyword.length).toUpperCase() !== keyword) return fail(position);
	const start = skipWhitespace(buffer, position + keyword.length);
	if (start === position + keyword.length) return fail(position);

	let quote: string | null = null;
	let brackets = 0;
	for (let pos = start; pos < buffer.length; pos++) {
		const ch = buffer[pos];
		if (quote !== null) {
			if (ch === quote) quote = null;
		} else if (brackets > 0 && ch === '<' && (buffer.startsWith('<!--', pos) || buffer.startsWith('<?', pos))) {
			const close = buffer[pos + 1] === '!' ? '-->' : '?>';
			const end = buffer.indexOf(close, pos + 2);
			if (end === -1) return fail(position);
			pos = end + close.length - 1;
		} else if (ch === '"' || ch === "'") {
			quote = ch;
		} else if (ch === '[') {
			brackets++;
		} else if (ch === ']') {
			if (brackets > 0) brackets--;
		} else if (ch === '>' && brackets === 0) {
			return succeed({ value: buffer.slice(start, pos) }, pos + 1);
		}
	}
	return fail(position);
};
