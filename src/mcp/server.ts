// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * MCP server setup with tool definitions.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { Provider } from "../providers/types.js";
import { captureScreenshot, screenToPng } from "../vnc/screenshot.js";
import type { RfbClientOptions } from "../vnc/types.js";

export function createMcpServer(provider: Provider, options: RfbClientOptions = {}): McpServer {
	const server = new McpServer({
		name: "rfb-capture",
		version: "0.1.0",
	});

	const capture = async (targetId: string) =>
		captureScreenshot(await provider.openStream(targetId), options);

	server.tool(
		"list_targets",
		`List all VNC targets available through the ${provider.name} provider`,
		{},
		async () => {
			const targets = await provider.listTargets();
			return {
				content: [
					{
						type: "text",
						text: JSON.stringify(targets, null, 2),
					},
				],
			};
		},
	);

	server.tool(
		"detect_screens",
		"Capture a target's framebuffer and report the physical screens (monitors) found in it, best first, as x/y/width/height/score.",
		{
			targetId: z.string().describe("Target identifier from list_targets"),
		},
		async ({ targetId }) => {
			const { screens } = await capture(targetId);
			return {
				content: [
					{
						type: "text",
						text: JSON.stringify(screens, null, 2),
					},
				],
			};
		},
	);

	server.tool(
		"get_screenshot",
		"Capture a screenshot of a target's VNC console as PNG. Set screen to the index of a screen reported by detect_screens to crop to that monitor.",
		{
			targetId: z.string().describe("Target identifier from list_targets"),
			screen: z
				.number()
				.int()
				.nonnegative()
				.optional()
				.describe("Index of a detected screen to crop to"),
		},
		async ({ targetId, screen }) => {
			const result = await capture(targetId);

			let png = result.png;
			if (screen !== undefined) {
				const selected = result.screens[screen];
				if (!selected) {
					throw new Error(
						`Screen ${screen} not found; ${result.screens.length} screen(s) detected`,
					);
				}
				png = screenToPng(result.framebuffer, selected);
			}

			return {
				content: [
					{
						type: "image",
						data: png.toString("base64"),
						mimeType: "image/png",
					},
				],
			};
		},
	);

	return server;
}
