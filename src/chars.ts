/**
 * xml-cursor — Character classification
 *
 * Helpers take numeric code units from `charCodeAt`. Name ranges follow
 * XML 1.0 (fifth edition) §2.3; `:` counts as a name character so that a
 * qualified name is scanned as one token and split afterwards.
 */

/** Inclusive `[from, to]` ranges of NameStartChar above ASCII. */
const NAME_START_RANGES: ReadonlyArray<readonly [number, number]> = [
	[0xc0, 0xd6],
	[0xd8, 0xf6],
	[0xf8, 0x2ff],
	[0x370, 0x37d],
	[0x37f, 0x1fff],
	[0x200c, 0x200d],
	[0x2070, 0x218f],
	[0x2c00, 0x2fef],
	[0x3001, 0xd7ff],
	[0xf900, 0xfdcf],
	[0xfdf0, 0xfffd],
	[0x10000, 0xeffff],
];

/** XML whitespace: space, tab, carriage-return, newline. */
export function isXmlWhitespace(code: number): boolean {
	return code === 0x20 || code === 0x09 || code === 0x0a || code === 0x0d;
}

/** Strips leading and trailing XML whitespace only; U+00A0 and U+FEFF are kept. */
export function trimXmlWhitespace(text: string): string {
	let start = 0;
	let end = text.length;
	while (start < end && isXmlWhitespace(text.charCodeAt(start))) start++;
	while (end > start && isXmlWhitespace(text.charCodeAt(end - 1))) end--;
	return text.slice(start, end);
}

/** XML 1.0 §2.3 production [4]. */
export function isNameStartChar(code: number): boolean {
	if (code < 0x80) {
		return code === 0x3a || code === 0x5f || (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a);
	}
	for (const [from, to] of NAME_START_RANGES) {
		if (code < from) return false;
		if (code <= to) return true;
	}
	return false;
}

/** XML 1.0 §2.3 production [4a]. */
export function isNameChar(code: number): boolean {
	if (isNameStartChar(code)) return true;
	if (code === 0x2d || code === 0x2e || code === 0xb7) return true; // - . ·
	if (isDecimalDigit(code)) return true;
	return (code >= 0x0300 && code <= 0x036f) || code === 0x203f || code === 0x2040;
}

/** ASCII hex digit [0-9A-Fa-f]. */
export function isHexDigit(code: number): boolean {
	return isDecimalDigit(code) || (code >= 0x41 && code <= 0x46) || (code >= 0x61 && code <= 0x66);
}

/** ASCII decimal digit [0-9]. */
export function isDecimalDigit(code: number): boolean {
	return code >= 0x30 && code <= 0x39;
}
