/**
 * A long-lived zlib stream that is fed one chunk at a time.
 *
 * RFB servers keep one deflate dictionary for the whole session and
 * sync-flush after each rectangle, so the client side must push every ZLib
 * rectangle through the same inflate context, in order. A fresh context per
 * rectangle fails as soon as the data refers back to an earlier rectangle.
 */

import { type Deflate, type Inflate, constants, createDeflate, createInflate } from "node:zlib";

export class ZlibContext {
	private output: Buffer[] = [];
	private failure: Error | null = null;
	private pending: ((err: Error | null) => void) | null = null;
	private closed = false;

	private constructor(private readonly stream: Inflate | Deflate) {
		stream.on("data", (chunk: Buffer) => {
			this.output.push(chunk);
		});
		stream.on("error", (err: Error) => {
			this.failure = err;
			this.settle(err);
		});
	}

	/** Decompressing context, as owned by a client session. */
	static inflater(): ZlibContext {
		return new ZlibContext(createInflate({ flush: constants.Z_SYNC_FLUSH }));
	}

	/** Compressing context producing what an RFB server sends. */
	static deflater(): ZlibContext {
		return new ZlibContext(createDeflate({ flush: constants.Z_SYNC_FLUSH }));
	}

	/** Push `data` through the stream and return everything it produced. */
	async process(data: Uint8Array): Promise<Buffer> {
		if (this.failure) throw this.failure;
		if (this.closed) throw new Error("zlib context is closed");

		await new Promise<void>((resolve, reject) => {
			this.pending = (err) => (err ? reject(err) : resolve());
			this.stream.write(data, (err) => this.settle(err ?? null));
		});

		const result = Buffer.concat(this.output);
		this.output = [];
		return result;
	}

	close(): void {
		if (this.closed) return;
		this.closed = true;
		this.stream.close();
	}

	private settle(err: Error | null): void {
		const pending = this.pending;
		this.pending = null;
		pending?.(err);
	}
}
