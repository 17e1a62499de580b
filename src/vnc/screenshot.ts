/**
 * High-level screenshot capture from an RFB stream.
 */

import type { Duplex } from "node:stream";
import { PNG } from "pngjs";
import type { Screen } from "../screens/screen.js";
import { RfbClient } from "./rfb-client.js";
import type { Framebuffer, RfbClientOptions } from "./types.js";

export interface ScreenshotResult {
	/** PNG image data */
	readonly png: Buffer;
	/** Framebuffer width in pixels */
	readonly width: number;
	/** Framebuffer height in pixels */
	readonly height: number;
	/** Decoded RGBA pixels, for cropping to a screen */
	readonly framebuffer: Framebuffer;
	/** Physical screens found in the capture, best first */
	readonly screens: Screen[];
}

/**
 * Negotiate over `stream`, capture one frame and return it as PNG together
 * with the detected screens. The stream is closed afterwards.
 */
export async function captureScreenshot(
	stream: Duplex,
	options?: RfbClientOptions,
): Promise<ScreenshotResult> {
	let client: RfbClient | null = null;

	try {
		client = await RfbClient.create(stream, options);
		const framebuffer = await client.capture();
		return {
			png: framebufferToPng(framebuffer),
			width: framebuffer.width,
			height: framebuffer.height,
			framebuffer,
			screens: client.detectScreens(),
		};
	} finally {
		if (client) {
			client.disconnect();
		} else {
			stream.destroy();
		}
	}
}

/** Encode raw RGBA pixel data as PNG. */
export function framebufferToPng(fb: Framebuffer): Buffer {
	const png = new PNG({ width: fb.width, height: fb.height });
	png.data = Buffer.from(fb.pixels);
	return PNG.sync.write(png);
}

/** PNG of a single screen's region. */
export function screenToPng(fb: Framebuffer, screen: Screen): Buffer {
	return framebufferToPng(screen.crop(fb));
}
