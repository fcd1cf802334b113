// src/ecp/logger.ts

/**
 * Very small logger interface so we can accept either the Homebridge log
 * object or console.* functions in tests. Messages use printf-style
 * placeholders (%s, %d, %o).
 */
export interface EcpLogger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export function consoleLogger(tag: string): EcpLogger {
	const prefix = `[${tag}]`;
	return {
		debug: (message: string, ...args: unknown[]) => console.debug(`${prefix} ${message}`, ...args),
		info: (message: string, ...args: unknown[]) => console.info(`${prefix} ${message}`, ...args),
		warn: (message: string, ...args: unknown[]) => console.warn(`${prefix} ${message}`, ...args),
		error: (message: string, ...args: unknown[]) => console.error(`${prefix} ${message}`, ...args),
	};
}

// Swallows everything; handy where a caller explicitly opts out of logging.
export const silentLogger: EcpLogger = {
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};
