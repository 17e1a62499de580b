import { PassThrough } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import type { Logger } from "../../src/logger.js";
import { UnrecognizedPixelFormatError } from "../../src/vnc/errors.js";
import {
	encodeFramebufferUpdateRequest,
	encodePixelFormat,
	encodeSetEncodings,
} from "../../src/vnc/messages.js";
import {
	KNOWN_FORMATS,
	SUPPORTED_ENCODINGS,
	channelOrderOf,
	negotiate,
	parsePixelFormat,
	readServerInit,
} from "../../src/vnc/pixel-format.js";
import { PIXEL_FORMAT_RGBA, type PixelFormat } from "../../src/vnc/types.js";
import { WireReader } from "../../src/vnc/wire-reader.js";

const PIXEL_FORMAT_RGB565: PixelFormat = {
	bitsPerPixel: 16,
	depth: 16,
	bigEndian: false,
	trueColor: true,
	redMax: 31,
	greenMax: 63,
	blueMax: 31,
	redShift: 11,
	greenShift: 5,
	blueShift: 0,
};

const SET_PIXEL_FORMAT_RGBA = [0, 0, 0, 0, 32, 24, 0, 1, 0, 255, 0, 255, 0, 255, 0, 8, 16, 0, 0, 0];
const SET_ENCODINGS = [2, 0, 0, 2, 0, 0, 0, 0, 0, 0, 0, 6];

function serverInitBytes(record: Uint8Array, name = "desk", width = 640, height = 480): Buffer {
	const size = Buffer.alloc(4);
	size.writeUInt16BE(width, 0);
	size.writeUInt16BE(height, 2);
	const nameBytes = Buffer.from(name, "utf8");
	const length = Buffer.alloc(4);
	length.writeUInt32BE(nameBytes.length);
	return Buffer.concat([size, record, length, nameBytes]);
}

function serverSpeaking(pf: PixelFormat, name?: string) {
	const input = new PassThrough();
	const sink = new PassThrough();
	input.write(serverInitBytes(encodePixelFormat(pf), name));
	return { reader: new WireReader(input), sink };
}

function written(sink: PassThrough): number[] {
	const chunk: unknown = sink.read();
	return Buffer.isBuffer(chunk) ? [...chunk] : [];
}

function silentLogger(): Logger {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function knownFormat(order: string): PixelFormat {
	const entry = KNOWN_FORMATS.find((known) => known.order === order);
	if (!entry) throw new Error(`no known format ${order}`);
	return entry.format;
}

describe("pixel formats", () => {
	it.each(KNOWN_FORMATS.map((entry): [string, PixelFormat] => [entry.order, entry.format]))(
		"should recognize %s",
		(order, format) => {
			expect(channelOrderOf(format)).toBe(order);
		},
	);

	it("should describe bgra as little-endian with red at shift 16", () => {
		expect(knownFormat("bgra")).toEqual({
			bitsPerPixel: 32,
			depth: 24,
			bigEndian: false,
			trueColor: true,
			redMax: 255,
			greenMax: 255,
			blueMax: 255,
			redShift: 16,
			greenShift: 8,
			blueShift: 0,
		});
	});

	it("should treat the default RGBA format as rgba", () => {
		expect(channelOrderOf(PIXEL_FORMAT_RGBA)).toBe("rgba");
	});

	it("should reject formats outside the table", () => {
		expect(() => channelOrderOf(PIXEL_FORMAT_RGB565)).toThrow(UnrecognizedPixelFormatError);
	});

	it("should keep only the low bit of the boolean flags", () => {
		const record = encodePixelFormat(knownFormat("argb"));
		record[2] = 0xfd; // big-endian, garbage above
		record[3] = 0x03; // true colour, garbage above

		const pf = parsePixelFormat(record);
		expect(pf.bigEndian).toBe(true);
		expect(pf.trueColor).toBe(true);
		expect(channelOrderOf(pf)).toBe("argb");

		record[2] = 0xfe;
		expect(parsePixelFormat(record).bigEndian).toBe(false);
	});

	it("should parse ServerInit", async () => {
		const { reader } = serverSpeaking(knownFormat("bgra"), "Bureau");
		const init = await readServerInit(reader);

		expect(init.width).toBe(640);
		expect(init.height).toBe(480);
		expect(init.name).toBe("Bureau");
		expect(init.pixelFormat).toEqual(knownFormat("bgra"));
		expect(reader.available).toBe(0);
	});
});

describe("client messages", () => {
	it("should announce Raw then ZLib", () => {
		expect([...encodeSetEncodings(SUPPORTED_ENCODINGS)]).toEqual(SET_ENCODINGS);
	});

	it("should encode a FramebufferUpdateRequest", () => {
		const request = encodeFramebufferUpdateRequest(true, { x: 1, y: 2, width: 300, height: 4 });
		expect([...request]).toEqual([3, 1, 0, 1, 0, 2, 1, 44, 0, 4]);
	});
});

describe("negotiate", () => {
	it("should keep a recognized format and only announce encodings", async () => {
		const { reader, sink } = serverSpeaking(knownFormat("bgra"));
		const result = await negotiate(reader, sink, { logger: silentLogger() });

		expect(result.channelOrder).toBe("bgra");
		expect(result.serverInit.width).toBe(640);
		expect(written(sink)).toEqual(SET_ENCODINGS);
		result.inflater.close();
	});

	it("should request RGBA for an unrecognized format", async () => {
		const logger = silentLogger();
		const { reader, sink } = serverSpeaking(PIXEL_FORMAT_RGB565);
		const result = await negotiate(reader, sink, { logger });

		expect(result.channelOrder).toBe("rgba");
		expect(written(sink)).toEqual([...SET_PIXEL_FORMAT_RGBA, ...SET_ENCODINGS]);
		expect(logger.warn).toHaveBeenCalledTimes(1);
		result.inflater.close();
	});

	it("should request RGBA when forced", async () => {
		const { reader, sink } = serverSpeaking(knownFormat("abgr"));
		const result = await negotiate(reader, sink, { forceRgba: true, logger: silentLogger() });

		expect(result.channelOrder).toBe("rgba");
		expect(written(sink)).toEqual([...SET_PIXEL_FORMAT_RGBA, ...SET_ENCODINGS]);
		result.inflater.close();
	});

	it("should not resend RGBA to a server already using it", async () => {
		const { reader, sink } = serverSpeaking(PIXEL_FORMAT_RGBA);
		const result = await negotiate(reader, sink, { forceRgba: true, logger: silentLogger() });

		expect(result.channelOrder).toBe("rgba");
		expect(written(sink)).toEqual(SET_ENCODINGS);
		result.inflater.close();
	});
});
