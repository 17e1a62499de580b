// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Positional reads over an ordered byte stream.
 *
 * Incoming chunks are queued as they arrive and handed out in exact-length
 * slices. There is exactly one reader per stream; callers must not start a
 * read while another is pending.
 */

import type { Readable } from "node:stream";
import {
	ConnectionUnusableError,
	IncompleteStreamError,
	ReadTimeoutError,
} from "./errors.js";

const DEFAULT_READ_TIMEOUT = 15_000;

export interface WireReaderOptions {
	/** Milliseconds a read may wait for bytes; 0 disables the limit */
	readonly readTimeout?: number;
}

export class WireReader {
	private readonly readTimeout: number;

	/** Buffered chunks not yet handed out */
	private chunks: Buffer[] = [];
	private buffered = 0;
	private ended = false;
	private streamError: Error | null = null;
	private failure: Error | null = null;
	private wake: (() => void) | null = null;

	constructor(stream: Readable, options: WireReaderOptions = {}) {
		this.readTimeout = options.readTimeout ?? DEFAULT_READ_TIMEOUT;

		stream.on("data", (data: Buffer | string) => {
			this.append(typeof data === "string" ? Buffer.from(data) : data);
		});
		stream.on("end", () => this.finish(null));
		stream.on("close", () => this.finish(null));
		stream.on("error", (err: Error) => this.finish(err));
	}

	/** Bytes received but not yet read. */
	get available(): number {
		return this.buffered;
	}

	/** Read exactly `n` bytes. */
	async readBytes(n: number): Promise<Buffer> {
		if (this.failure) {
			throw new ConnectionUnusableError(undefined, { cause: this.failure });
		}
		try {
			await this.waitForBytes(n);
		} catch (err) {
			this.failure = err instanceof Error ? err : new Error(String(err));
			throw err;
		}
		return this.take(n);
	}

	/** Read a big-endian unsigned integer of `n` bytes. */
	async readInt(n: number): Promise<number> {
		if (!Number.isInteger(n) || n < 1 || n > 6) {
			throw new RangeError(`Integer width must be 1-6 bytes, got ${n}`);
		}
		return (await this.readBytes(n)).readUIntBE(0, n);
	}

	/** Read a big-endian signed 32-bit integer. */
	async readInt32(): Promise<number> {
		return (await this.readBytes(4)).readInt32BE(0);
	}

	/** Read a u32 length followed by that many bytes of UTF-8 text. */
	async readText(): Promise<string> {
		const length = await this.readInt(4);
		return (await this.readBytes(length)).toString("utf8");
	}

	async skip(n: number): Promise<void> {
		await this.readBytes(n);
	}

	/**
	 * Wait up to `timeout` ms for at least one unread byte without consuming
	 * anything. Resolves false on timeout or end of stream; a timeout here does
	 * not poison the reader since no message has been started.
	 */
	async waitForData(timeout: number): Promise<boolean> {
		if (this.failure) {
			throw new ConnectionUnusableError(undefined, { cause: this.failure });
		}
		if (this.buffered > 0) return true;
		if (this.ended) return false;

		return new Promise<boolean>((resolve) => {
			const timer = setTimeout(() => {
				this.wake = null;
				resolve(false);
			}, timeout);
			this.wake = () => {
				clearTimeout(timer);
				resolve(this.buffered > 0);
			};
		});
	}

	private append(data: Buffer): void {
		if (data.length === 0) return;
		this.chunks.push(data);
		this.buffered += data.length;
		this.notify();
	}

	private finish(err: Error | null): void {
		this.ended = true;
		if (err && !this.streamError) {
			this.streamError = err;
		}
		this.notify();
	}

	private notify(): void {
		const wake = this.wake;
		this.wake = null;
		wake?.();
	}

	/** Wait until at least `n` bytes are buffered. */
	private async waitForBytes(n: number): Promise<void> {
		const deadline = this.readTimeout > 0 ? Date.now() + this.readTimeout : Number.POSITIVE_INFINITY;

		while (this.buffered < n) {
			if (this.ended) {
				throw new IncompleteStreamError(
					n,
					this.buffered,
					this.streamError ? { cause: this.streamError } : undefined,
				);
			}
			const remaining = deadline - Date.now();
			if (remaining <= 0) {
				throw new ReadTimeoutError(n, this.readTimeout);
			}
			await this.nextChunk(n, remaining);
		}
	}

	private nextChunk(n: number, remaining: number): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			const timer = Number.isFinite(remaining)
				? setTimeout(() => {
						this.wake = null;
						reject(new ReadTimeoutError(n, this.readTimeout));
					}, remaining)
				: null;
			this.wake = () => {
				if (timer) clearTimeout(timer);
				resolve();
			};
		});
	}

	private take(n: number): Buffer {
		if (n === 0) return Buffer.alloc(0);

		const head = this.chunks[0];
		if (head.length >= n) {
			const result = head.subarray(0, n);
			if (head.length === n) {
				this.chunks.shift();
			} else {
				this.chunks[0] = head.subarray(n);
			}
			this.buffered -= n;
			return result;
		}

		const result = Buffer.allocUnsafe(n);
		let offset = 0;
		while (offset < n) {
			const chunk = this.chunks[0];
			const count = Math.min(chunk.length, n - offset);
			chunk.copy(result, offset, 0, count);
			offset += count;
			if (count === chunk.length) {
				this.chunks.shift();
			} else {
				this.chunks[0] = chunk.subarray(count);
			}
		}
		this.buffered -= n;
		return result;
	}
}
