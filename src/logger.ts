/**
 * xml-cursor — Logging
 *
 * The library never writes to the console on its own. Callers pass a
 * `Logger` through the reader, dispatcher or builder options; the default
 * discards everything.
 */

export interface Logger {
	debug(message: string, ...attributes: unknown[]): void;
	info(message: string, ...attributes: unknown[]): void;
	warn(message: string, ...attributes: unknown[]): void;
	error(message: string, ...attributes: unknown[]): void;
}

const noop = (): void => {};

/** Default logger: drops every message. */
export const silentLogger: Logger = {
	debug: noop,
	info: noop,
	warn: noop,
	error: noop,
};

/** Writes to the global console, optionally prefixing each line with a context tag. */
export class ConsoleLogger implements Logger {
	private readonly context: string | undefined;

	constructor(context?: string) {
		this.context = context;
	}

	/** A new console logger tagged with `context` instead; `undefined` drops the tag. */
	withContext(context: string | undefined): ConsoleLogger {
		return new ConsoleLogger(context);
	}

	debug(message: string, ...attributes: unknown[]): void {
		if (this.context) console.debug(this.context, message, ...attributes);
		else console.debug(message, ...attributes);
	}

	info(message: string, ...attributes: unknown[]): void {
		if (this.context) console.info(this.context, message, ...attributes);
		else console.info(message, ...attributes);
	}

	warn(message: string, ...attributes: unknown[]): void {
		if (this.context) console.warn(this.context, message, ...attributes);
		else console.warn(message, ...attributes);
	}

	error(message: string, ...attributes: unknown[]): void {
		if (this.context) console.error(this.context, message, ...attributes);
		else console.error(message, ...attributes);
	}
}
