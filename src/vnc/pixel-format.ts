// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * ServerInit parsing and pixel-format negotiation.
 */

import type { Writable } from "node:stream";
import { UnrecognizedPixelFormatError } from "./errors.js";
import { encodeSetEncodings, encodeSetPixelFormat } from "./messages.js";
import {
	type ChannelOrder,
	EncodingType,
	PIXEL_FORMAT_RGBA,
	type PixelFormat,
	type ServerInit,
} from "./types.js";
import type { WireReader } from "./wire-reader.js";
import { ZlibContext } from "./zlib-context.js";
import type { Logger } from "../logger.js";

/** Encodings announced to the server, in preference order */
export const SUPPORTED_ENCODINGS: readonly EncodingType[] = [EncodingType.Raw, EncodingType.ZLib];

interface KnownFormat {
	readonly order: ChannelOrder;
	readonly format: PixelFormat;
}

function trueColor32(bigEndian: boolean, redShift: number, blueShift: number): PixelFormat {
	return { ...PIXEL_FORMAT_RGBA, bigEndian, redShift, greenShift: 8, blueShift };
}

/** The 32-bit true-colour layouts that can be decoded without conversion */
export const KNOWN_FORMATS: readonly KnownFormat[] = [
	{ order: "bgra", format: trueColor32(false, 16, 0) },
	{ order: "rgba", format: trueColor32(false, 0, 16) },
	{ order: "argb", format: trueColor32(true, 16, 0) },
	{ order: "abgr", format: trueColor32(true, 0, 16) },
];

/**
 * Parse the 13 meaningful bytes of a pixel-format record. The big-endian and
 * true-colour flags are reduced to their low bit; some servers leave garbage
 * in the upper bits.
 */
export function parsePixelFormat(record: Uint8Array): PixelFormat {
	const view = new DataView(record.buffer, record.byteOffset, record.byteLength);
	return {
		bitsPerPixel: record[0],
		depth: record[1],
		bigEndian: (record[2] & 1) === 1,
		trueColor: (record[3] & 1) === 1,
		redMax: view.getUint16(4),
		greenMax: view.getUint16(6),
		blueMax: view.getUint16(8),
		redShift: record[10],
		greenShift: record[11],
		blueShift: record[12],
	};
}

export function samePixelFormat(a: PixelFormat, b: PixelFormat): boolean {
	return (
		a.bitsPerPixel === b.bitsPerPixel &&
		a.depth === b.depth &&
		a.bigEndian === b.bigEndian &&
		a.trueColor === b.trueColor &&
		a.redMax === b.redMax &&
		a.greenMax === b.greenMax &&
		a.blueMax === b.blueMax &&
		a.redShift === b.redShift &&
		a.greenShift === b.greenShift &&
		a.blueShift === b.blueShift
	);
}

/** Channel order of a known format; throws for anything else. */
export function channelOrderOf(pf: PixelFormat): ChannelOrder {
	const known = KNOWN_FORMATS.find((entry) => samePixelFormat(entry.format, pf));
	if (!known) {
		throw new UnrecognizedPixelFormatError(pf);
	}
	return known.order;
}

export async function readServerInit(reader: WireReader): Promise<ServerInit> {
	const width = await reader.readInt(2);
	const height = await reader.readInt(2);
	const pixelFormat = parsePixelFormat(await reader.readBytes(13));
	await reader.skip(3); // padding
	const name = await reader.readText();

	return { width, height, pixelFormat, name };
}

export interface NegotiateOptions {
	readonly forceRgba?: boolean;
	readonly logger?: Logger;
}

export interface Negotiation {
	readonly serverInit: ServerInit;
	readonly channelOrder: ChannelOrder;
	/** Inflate context for the lifetime of the connection */
	readonly inflater: ZlibContext;
}

/**
 * Read ServerInit, settle on a channel order and announce our encodings.
 * An unrecognized server format is replaced by canonical RGBA rather than
 * converted.
 */
export async function negotiate(
	reader: WireReader,
	writer: Writable,
	options: NegotiateOptions = {},
): Promise<Negotiation> {
	const serverInit = await readServerInit(reader);
	const { logger } = options;

	let channelOrder: ChannelOrder;
	try {
		channelOrder = channelOrderOf(serverInit.pixelFormat);
	} catch (err) {
		if (!(err instanceof UnrecognizedPixelFormatError)) throw err;
		logger?.warn(`${err.message}; requesting RGBA`);
		channelOrder = "rgba";
		writer.write(encodeSetPixelFormat(PIXEL_FORMAT_RGBA));
	}

	if (options.forceRgba && channelOrder !== "rgba") {
		channelOrder = "rgba";
		writer.write(encodeSetPixelFormat(PIXEL_FORMAT_RGBA));
	}

	writer.write(encodeSetEncodings(SUPPORTED_ENCODINGS));

	logger?.debug(
		`Desktop "${serverInit.name}" ${serverInit.width}x${serverInit.height}, channel order ${channelOrder}`,
	);

	return { serverInit, channelOrder, inflater: ZlibContext.inflater() };
}
