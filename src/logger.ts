/**
 * Console-backed logging. Everything goes to stderr so stdout stays free for
 * protocol traffic (an MCP stdio transport, for one).
 */

export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

export function createConsoleLogger(debug = false): Logger {
	return {
		debug(message) {
			if (debug) {
				console.error(`[rfb] ${message}`);
			}
		},
		info(message) {
			console.error(`[rfb] ${message}`);
		},
		warn(message) {
			console.error(`[rfb] warning: ${message}`);
		},
		error(message) {
			console.error(`[rfb] error: ${message}`);
		},
	};
}
