/**
 * xml-cursor — Error types
 *
 * Malformed markup never raises by itself: the reader skips it and reports
 * the position through its `onParseError` callback. These classes are for
 * consumers that decide to stop (the strict tree builder) and for misuse of
 * the axis API.
 */

/**
 * Thrown by a strict parse at the first malformed position.
 */
export class ParseError extends Error {
	/** Code-unit offset in the source string where the problem was detected. */
	readonly position: number;
	/** 1-based line number. */
	readonly line: number;
	/** 1-based column number. */
	readonly column: number;

	constructor(message: string, position: number, line: number, column: number) {
		super(`${message} (line ${line}, col ${column})`);
		this.name = 'XmlParseError';
		this.position = position;
		this.line = line;
		this.column = column;
	}

	/** Builds an error for `position` in `text`, computing line and column. */
	static at(text: string, position: number, message = 'Malformed markup'): ParseError {
		const { line, column } = lineAndColumn(text, position);
		return new ParseError(message, position, line, column);
	}
}

/** Thrown when two nodes that do not share a root are compared. */
export class AxisError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'XmlAxisError';
	}
}

/** 1-based line and column of `position` in `text`. Only `\n` starts a line. */
export function lineAndColumn(text: string, position: number): { line: number; column: number } {
	let line = 1;
	let column = 1;
	for (let i = 0; i < position && i < text.length; i++) {
		if (text.charCodeAt(i) === 0x0a) {
			line++;
			column = 1;
		} else {
			column++;
		}
	}
	return { line, column };
}
