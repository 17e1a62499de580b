// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Public API: RFB session decoding, screen detection and capture helpers.
 */

export { clientOptionsSchema, loadClientOptions, parseClientOptions } from "./config.js";
export { type Logger, createConsoleLogger } from "./logger.js";
export { createMcpServer } from "./mcp/server.js";
export type { Provider, Target } from "./providers/types.js";
export { detectScreens } from "./screens/detect.js";
export { type Ratio, limitDenominator } from "./screens/ratio.js";
export { SCREEN_RATIOS, Screen } from "./screens/screen.js";
export { CHANNEL_ORDERS, fromRgba, toRgba } from "./vnc/channels.js";
export {
	ConnectionUnusableError,
	IncompleteStreamError,
	InvalidRectangleError,
	InvalidUpdateTypeError,
	ReadTimeoutError,
	RfbError,
	UnrecognizedPixelFormatError,
	UnsupportedEncodingError,
} from "./vnc/errors.js";
export { FramebufferDecoder } from "./vnc/framebuffer.js";
export { KNOWN_FORMATS, SUPPORTED_ENCODINGS, negotiate, readServerInit } from "./vnc/pixel-format.js";
export { RfbClient } from "./vnc/rfb-client.js";
export {
	type ScreenshotResult,
	captureScreenshot,
	framebufferToPng,
	screenToPng,
} from "./vnc/screenshot.js";
export * from "./vnc/types.js";
export { WireReader, type WireReaderOptions } from "./vnc/wire-reader.js";
export { ZlibContext } from "./vnc/zlib-context.js";
