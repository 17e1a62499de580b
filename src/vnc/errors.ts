// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Errors raised while decoding an RFB session.
 *
 * Everything except UnrecognizedPixelFormatError is fatal: the byte stream is
 * positional, so after a failed read the connection can no longer be trusted.
 */

import type { PixelFormat } from "./types.js";

export class RfbError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** The stream ended before a read could be satisfied. */
export class IncompleteStreamError extends RfbError {
	constructor(
		readonly wanted: number,
		readonly available: number,
		options?: ErrorOptions,
	) {
		super(`Stream ended after ${available} of ${wanted} bytes`, options);
	}
}

export class ReadTimeoutError extends RfbError {
	constructor(
		readonly wanted: number,
		readonly timeout: number,
	) {
		super(`Read timeout after ${timeout}ms waiting for ${wanted} bytes`);
	}
}

/** The server used an encoding outside the announced set. */
export class UnsupportedEncodingError extends RfbError {
	constructor(readonly encoding: number) {
		super(`Unsupported encoding: ${encoding}`);
	}
}

export class InvalidUpdateTypeError extends RfbError {
	constructor(readonly updateType: number) {
		super(`Invalid update type: ${updateType}`);
	}
}

export class InvalidRectangleError extends RfbError {}

/** Handled during negotiation by falling back to RGBA. */
export class UnrecognizedPixelFormatError extends RfbError {
	constructor(readonly pixelFormat: PixelFormat) {
		super(`Unrecognized pixel format: ${JSON.stringify(pixelFormat)}`);
	}
}

/** The session failed earlier or was disconnected. */
export class ConnectionUnusableError extends RfbError {
	constructor(message = "Connection is no longer usable", options?: ErrorOptions) {
		super(message, options);
	}
}
