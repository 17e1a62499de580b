// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * RFB (VNC) client session for screenshot capture.
 * Takes over a stream right after ClientInit, negotiates the pixel format and
 * decodes framebuffer updates.
 */

import type { Duplex } from "node:stream";
import { parseClientOptions } from "../config.js";
import { type Logger, createConsoleLogger } from "../logger.js";
import { detectScreens } from "../screens/detect.js";
import type { Screen } from "../screens/screen.js";
import { ConnectionUnusableError, InvalidUpdateTypeError } from "./errors.js";
import { FramebufferDecoder } from "./framebuffer.js";
import { negotiate } from "./pixel-format.js";
import {
	type ChannelOrder,
	type Framebuffer,
	type RfbClientOptions,
	type ServerInit,
	UpdateType,
} from "./types.js";
import { WireReader } from "./wire-reader.js";
import type { ZlibContext } from "./zlib-context.js";

const DEFAULT_SETTLE_TIME = 250;

export class RfbClient {
	private failure: Error | null = null;
	private closed = false;

	private constructor(
		private readonly stream: Duplex,
		private readonly reader: WireReader,
		private readonly video: FramebufferDecoder,
		private readonly inflater: ZlibContext,
		private readonly logger: Logger,
		private readonly settleTime: number,
		readonly serverInit: ServerInit,
	) {}

	/**
	 * Negotiate over `stream`, which must be positioned just after ClientInit
	 * so that the next bytes from the server are ServerInit.
	 */
	static async create(stream: Duplex, options: RfbClientOptions = {}): Promise<RfbClient> {
		const {
			readTimeout,
			settleTime,
			forceRgba,
			debug,
			logger: customLogger,
		} = parseClientOptions(options);
		const logger = customLogger ?? createConsoleLogger(debug);
		const reader = new WireReader(stream, { readTimeout });

		const { serverInit, channelOrder, inflater } = await negotiate(reader, stream, {
			forceRgba,
			logger,
		});
		const video = new FramebufferDecoder({
			reader,
			writer: stream,
			width: serverInit.width,
			height: serverInit.height,
			channelOrder,
			inflater,
		});

		return new RfbClient(
			stream,
			reader,
			video,
			inflater,
			logger,
			settleTime ?? DEFAULT_SETTLE_TIME,
			serverInit,
		);
	}

	get name(): string {
		return this.serverInit.name;
	}

	get width(): number {
		return this.serverInit.width;
	}

	get height(): number {
		return this.serverInit.height;
	}

	get channelOrder(): ChannelOrder {
		return this.video.channelOrder;
	}

	/** Decoder state; exposed for callers that drive `read()` themselves. */
	get framebuffer(): FramebufferDecoder {
		return this.video;
	}

	/** Read one server message and return its type. */
	async read(): Promise<UpdateType> {
		this.ensureUsable();
		try {
			return await this.readUpdate();
		} catch (err) {
			this.fail(err);
			throw err;
		}
	}

	/**
	 * Request a full update and read until every pixel has been written.
	 * Returns the whole framebuffer as RGBA.
	 */
	async screenshot(x = 0, y = 0, width?: number, height?: number): Promise<Framebuffer> {
		this.ensureUsable();
		try {
			this.video.discard();
			this.video.refresh(x, y, width, height);

			let updates = 0;
			for (;;) {
				const updateType = await this.readUpdate();
				if (updateType === UpdateType.Video) {
					updates++;
					if (this.video.isComplete()) break;
				}
			}
			this.logger.debug(`Screenshot complete after ${updates} update(s)`);

			return { width: this.width, height: this.height, pixels: this.video.asRGBA() };
		} catch (err) {
			this.fail(err);
			throw err;
		}
	}

	/**
	 * Request a full update and read until every pixel has been written or the
	 * server has sent nothing new for the settle time. Multi-monitor servers
	 * never paint the gaps between screens, so this is what screen detection
	 * runs on. Unwritten pixels come back as transparent black.
	 */
	async capture(): Promise<Framebuffer> {
		this.ensureUsable();
		try {
			this.video.discard();
			this.video.refresh();

			let updates = 0;
			do {
				if ((await this.readUpdate()) === UpdateType.Video) updates++;
			} while (!this.video.isComplete() && (await this.reader.waitForData(this.settleTime)));
			this.logger.debug(
				`Capture settled after ${updates} update(s), complete=${this.video.isComplete()}`,
			);

			return { width: this.width, height: this.height, pixels: this.video.asRGBA() };
		} catch (err) {
			this.fail(err);
			throw err;
		}
	}

	/** Screens visible in the current buffer, best first. */
	detectScreens(): Screen[] {
		return detectScreens(this.video.alphaMask());
	}

	/** Release the inflate context and close the stream. */
	disconnect(): void {
		if (this.closed) return;
		this.closed = true;
		this.inflater.close();
		this.stream.destroy();
	}

	private async readUpdate(): Promise<UpdateType> {
		const updateType = await this.reader.readInt(1);
		if (updateType !== UpdateType.Video) {
			throw new InvalidUpdateTypeError(updateType);
		}

		await this.reader.skip(1); // padding
		const count = await this.reader.readInt(2);
		this.logger.debug(`Framebuffer update: ${count} rectangle(s)`);
		for (let i = 0; i < count; i++) {
			await this.video.read();
		}
		return UpdateType.Video;
	}

	private ensureUsable(): void {
		if (this.closed) {
			throw new ConnectionUnusableError("Client is disconnected");
		}
		if (this.failure) {
			throw new ConnectionUnusableError(undefined, { cause: this.failure });
		}
	}

	private fail(err: unknown): void {
		this.failure = err instanceof Error ? err : new Error(String(err));
		this.logger.error(`Session failed: ${this.failure.message}`);
	}
}
