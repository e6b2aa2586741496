/**
 * Prefixed console logging.  Errors are always written; debug output only when
 * the QUADRANT_TREE_DEBUG environment variable is "true".
 */
export class Logger {
	static readonly PREFIX = "[quadrant-tree]";
	static readonly DEBUG_VARIABLE = "QUADRANT_TREE_DEBUG";

	static error(message: string, ...args: unknown[]): void {
		console.error(`${this.PREFIX} ERROR: ${message}`, ...args);
	}

	static debug(message: string, ...args: unknown[]): void {
		if (this.isDebugEnabled()) {
			console.debug(`${this.PREFIX} [DEBUG] ${message}`, ...args);
		}
	}

	/** Read on every call, so the flag can be flipped at runtime */
	static isDebugEnabled(): boolean {
		return process.env[this.DEBUG_VARIABLE] === "true";
	}
}
