/**
 * RFB (Remote Framebuffer) protocol types.
 * Based on RFC 6143, The Remote Framebuffer Protocol.
 */

import type { Logger } from "../logger.js";

/** RFB encoding types this client announces, in preference order */
export const EncodingType = {
	Raw: 0,
	ZLib: 6,
} as const;
export type EncodingType = (typeof EncodingType)[keyof typeof EncodingType];

/** Server-to-client update types */
export const UpdateType = {
	Video: 0,
} as const;
export type UpdateType = (typeof UpdateType)[keyof typeof UpdateType];

/** Client-to-server message types */
export const ClientMessageType = {
	SetPixelFormat: 0,
	SetEncodings: 2,
	FramebufferUpdateRequest: 3,
} as const;
export type ClientMessageType = (typeof ClientMessageType)[keyof typeof ClientMessageType];

/** Byte order of the four channels of a 32-bit pixel as it sits in memory */
export type ChannelOrder = "bgra" | "rgba" | "argb" | "abgr";

/** One channel of a pixel; "a" is the written-marker slot */
export type Channel = "r" | "g" | "b" | "a";

/** Pixel format description */
export interface PixelFormat {
	readonly bitsPerPixel: number;
	readonly depth: number;
	readonly bigEndian: boolean;
	readonly trueColor: boolean;
	readonly redMax: number;
	readonly greenMax: number;
	readonly blueMax: number;
	readonly redShift: number;
	readonly greenShift: number;
	readonly blueShift: number;
}

/** Server initialization message data */
export interface ServerInit {
	readonly width: number;
	readonly height: number;
	readonly pixelFormat: PixelFormat;
	readonly name: string;
}

export interface Rect {
	readonly x: number;
	readonly y: number;
	readonly width: number;
	readonly height: number;
}

/** Header of a rectangle within a framebuffer update */
export interface RectangleUpdate extends Rect {
	readonly encoding: number;
}

/** RGBA framebuffer data */
export interface Framebuffer {
	readonly width: number;
	readonly height: number;
	readonly pixels: Uint8Array; // RGBA pixel data
}

/**
 * Per-pixel alpha bytes of a decoded buffer. A pixel counts as written when
 * its alpha byte is 255.
 */
export interface AlphaMask {
	readonly width: number;
	readonly height: number;
	readonly alpha: Uint8Array;
}

/** Options for the RFB client */
export interface RfbClientOptions {
	/** Milliseconds a single read may wait for bytes; 0 disables the limit */
	readonly readTimeout?: number;
	/** Quiet period in ms after which capture() stops waiting for more updates */
	readonly settleTime?: number;
	/** Always ask the server for canonical RGBA, even for a recognized format */
	readonly forceRgba?: boolean;
	/** Emit debug log lines */
	readonly debug?: boolean;
	readonly logger?: Logger;
}

/** Default RGBA pixel format we request from the server */
export const PIXEL_FORMAT_RGBA: PixelFormat = {
	bitsPerPixel: 32,
	depth: 24,
	bigEndian: false,
	trueColor: true,
	redMax: 255,
	greenMax: 255,
	blueMax: 255,
	redShift: 0,
	greenShift: 8,
	blueShift: 16,
};
