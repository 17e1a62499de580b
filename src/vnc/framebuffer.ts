// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Framebuffer state for one RFB session: rectangle decoding into a pixel
 * buffer kept in the negotiated channel order.
 *
 * The alpha slot of every pixel doubles as a "written" marker. Servers put
 * padding there, so it is overwritten with 255 whenever a rectangle lands,
 * and a buffer is complete once no pixel has any other alpha value.
 */

import type { Writable } from "node:stream";
import { channelIndex, toRgba } from "./channels.js";
import { InvalidRectangleError, UnsupportedEncodingError } from "./errors.js";
import { encodeFramebufferUpdateRequest } from "./messages.js";
import {
	type AlphaMask,
	type ChannelOrder,
	EncodingType,
	type RectangleUpdate,
} from "./types.js";
import type { WireReader } from "./wire-reader.js";
import type { ZlibContext } from "./zlib-context.js";

const BYTES_PER_PIXEL = 4;
const WRITTEN = 255;

export interface FramebufferDecoderInit {
	readonly reader: WireReader;
	readonly writer: Writable;
	readonly width: number;
	readonly height: number;
	readonly channelOrder: ChannelOrder;
	readonly inflater: ZlibContext;
}

export class FramebufferDecoder {
	readonly width: number;
	readonly height: number;
	readonly channelOrder: ChannelOrder;

	private readonly reader: WireReader;
	private readonly writer: Writable;
	private readonly inflater: ZlibContext;
	private readonly alphaOffset: number;

	/** Pixel data in `channelOrder`, allocated on the first decoded rectangle */
	private data: Uint8Array | null = null;

	constructor(init: FramebufferDecoderInit) {
		this.reader = init.reader;
		this.writer = init.writer;
		this.width = init.width;
		this.height = init.height;
		this.channelOrder = init.channelOrder;
		this.inflater = init.inflater;
		this.alphaOffset = channelIndex(init.channelOrder, "a");
	}

	get hasBuffer(): boolean {
		return this.data !== null;
	}

	/**
	 * Ask the server for an update of the given area (the whole screen by
	 * default). The request is incremental once a buffer exists.
	 */
	refresh(x = 0, y = 0, width: number = this.width, height: number = this.height): void {
		const incremental = this.data !== null;
		this.writer.write(encodeFramebufferUpdateRequest(incremental, { x, y, width, height }));
	}

	/** Decode one rectangle from the stream into the buffer. */
	async read(): Promise<RectangleUpdate> {
		const x = await this.reader.readInt(2);
		const y = await this.reader.readInt(2);
		const width = await this.reader.readInt(2);
		const height = await this.reader.readInt(2);
		const encoding = await this.reader.readInt32();
		const size = width * height * BYTES_PER_PIXEL;

		let pixels: Uint8Array;
		if (encoding === EncodingType.Raw) {
			pixels = await this.reader.readBytes(size);
		} else if (encoding === EncodingType.ZLib) {
			const length = await this.reader.readInt(4);
			pixels = await this.inflater.process(await this.reader.readBytes(length));
			if (pixels.length !== size) {
				throw new InvalidRectangleError(
					`ZLib rectangle ${width}x${height} inflated to ${pixels.length} bytes, expected ${size}`,
				);
			}
		} else {
			throw new UnsupportedEncodingError(encoding);
		}

		if (x + width > this.width || y + height > this.height) {
			throw new InvalidRectangleError(
				`Rectangle ${width}x${height}+${x}+${y} exceeds framebuffer ${this.width}x${this.height}`,
			);
		}

		this.blit({ x, y, width, height, encoding }, pixels);
		return { x, y, width, height, encoding };
	}

	/** Forget all decoded pixels; the next refresh asks for a full update. */
	discard(): void {
		this.data = null;
	}

	/** True once every pixel has been covered by a decoded rectangle. */
	isComplete(): boolean {
		if (!this.data) return false;
		for (let i = this.alphaOffset; i < this.data.length; i += BYTES_PER_PIXEL) {
			if (this.data[i] !== WRITTEN) return false;
		}
		return true;
	}

	/** The buffer in R, G, B, A order; all zeros when nothing was decoded. */
	asRGBA(): Uint8Array {
		if (!this.data) {
			return new Uint8Array(this.width * this.height * BYTES_PER_PIXEL);
		}
		return toRgba(this.data, this.channelOrder);
	}

	alphaMask(): AlphaMask {
		const alpha = new Uint8Array(this.width * this.height);
		if (this.data) {
			for (let i = 0; i < alpha.length; i++) {
				alpha[i] = this.data[i * BYTES_PER_PIXEL + this.alphaOffset];
			}
		}
		return { width: this.width, height: this.height, alpha };
	}

	private blit(rect: RectangleUpdate, pixels: Uint8Array): void {
		if (!this.data) {
			this.data = new Uint8Array(this.width * this.height * BYTES_PER_PIXEL);
		}
		const data = this.data;
		const rowBytes = rect.width * BYTES_PER_PIXEL;

		for (let row = 0; row < rect.height; row++) {
			const srcOffset = row * rowBytes;
			const dstOffset = ((rect.y + row) * this.width + rect.x) * BYTES_PER_PIXEL;
			data.set(pixels.subarray(srcOffset, srcOffset + rowBytes), dstOffset);
			for (let i = dstOffset + this.alphaOffset; i < dstOffset + rowBytes; i += BYTES_PER_PIXEL) {
				data[i] = WRITTEN;
			}
		}
	}
}
