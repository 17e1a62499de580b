/**
 * Client-to-server message encoders.
 */

import { ClientMessageType, type PixelFormat, type Rect } from "./types.js";

/** 16-byte pixel-format record: 13 bytes of fields plus 3 bytes of padding. */
export function encodePixelFormat(pf: PixelFormat): Uint8Array {
	const buf = new Uint8Array(16);
	const view = new DataView(buf.buffer);

	buf[0] = pf.bitsPerPixel;
	buf[1] = pf.depth;
	buf[2] = pf.bigEndian ? 1 : 0;
	buf[3] = pf.trueColor ? 1 : 0;
	view.setUint16(4, pf.redMax);
	view.setUint16(6, pf.greenMax);
	view.setUint16(8, pf.blueMax);
	buf[10] = pf.redShift;
	buf[11] = pf.greenShift;
	buf[12] = pf.blueShift;
	// bytes 13-15: padding

	return buf;
}

export function encodeSetPixelFormat(pf: PixelFormat): Uint8Array {
	const buf = new Uint8Array(20);

	buf[0] = ClientMessageType.SetPixelFormat;
	// bytes 1-3: padding
	buf.set(encodePixelFormat(pf), 4);

	return buf;
}

export function encodeSetEncodings(encodings: readonly number[]): Uint8Array {
	const buf = new Uint8Array(4 + encodings.length * 4);
	const view = new DataView(buf.buffer);

	buf[0] = ClientMessageType.SetEncodings;
	// byte 1: padding
	view.setUint16(2, encodings.length);
	encodings.forEach((encoding, i) => {
		view.setInt32(4 + i * 4, encoding);
	});

	return buf;
}

export function encodeFramebufferUpdateRequest(incremental: boolean, rect: Rect): Uint8Array {
	const buf = new Uint8Array(10);
	const view = new DataView(buf.buffer);

	buf[0] = ClientMessageType.FramebufferUpdateRequest;
	buf[1] = incremental ? 1 : 0;
	view.setUint16(2, rect.x);
	view.setUint16(4, rect.y);
	view.setUint16(6, rect.width);
	view.setUint16(8, rect.height);

	return buf;
}
