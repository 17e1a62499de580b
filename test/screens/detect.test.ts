// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

import { describe, expect, it } from "vitest";
import { detectScreens } from "../../src/screens/detect.js";
import type { Screen } from "../../src/screens/screen.js";
import type { AlphaMask, Rect } from "../../src/vnc/types.js";

/** Alpha mask with the given rectangles marked as written. */
function maskOf(width: number, height: number, painted: Rect[]): AlphaMask {
	const alpha = new Uint8Array(width * height);
	for (const rect of painted) {
		for (let row = rect.y; row < rect.y + rect.height; row++) {
			alpha.fill(255, row * width + rect.x, row * width + rect.x + rect.width);
		}
	}
	return { width, height, alpha };
}

function geometry(screens: Screen[]): number[][] {
	return screens.map((s) => [s.x, s.y, s.width, s.height]);
}

describe("detectScreens", () => {
	it("should find nothing in an empty mask", () => {
		expect(detectScreens(maskOf(10, 10, []))).toEqual([]);
	});

	it("should find a single full-frame screen", () => {
		const screens = detectScreens(maskOf(100, 100, [{ x: 0, y: 0, width: 100, height: 100 }]));

		expect(geometry(screens)).toEqual([[0, 0, 100, 100]]);
		expect(screens[0].score).toBe(5000);
	});

	it("should find a screen that does not touch the frame edges", () => {
		const screens = detectScreens(maskOf(50, 40, [{ x: 5, y: 4, width: 40, height: 30 }]));

		expect(geometry(screens)).toEqual([[5, 4, 40, 30]]);
		expect(screens[0].score).toBe(1200);
	});

	it("should separate two screens with a gap between them", () => {
		const screens = detectScreens(
			maskOf(1700, 600, [
				{ x: 0, y: 0, width: 800, height: 600 },
				{ x: 900, y: 0, width: 800, height: 600 },
			]),
		);

		expect(geometry(screens)).toEqual([
			[0, 0, 800, 600],
			[900, 0, 800, 600],
		]);
		expect(screens.map((s) => s.score)).toEqual([480000, 480000]);
	});

	it("should separate side-by-side screens of different heights", () => {
		const screens = detectScreens(
			maskOf(3200, 1080, [
				{ x: 0, y: 0, width: 1920, height: 1080 },
				{ x: 1920, y: 0, width: 1280, height: 1024 },
			]),
		);

		expect(geometry(screens)).toEqual([
			[0, 0, 1920, 1080],
			[1920, 0, 1280, 1024],
		]);
		expect(screens[0].score).toBe(2073600);
		expect(screens[1].score).toBeCloseTo(524288);
	});

	it("should separate stacked screens", () => {
		const screens = detectScreens(
			maskOf(40, 50, [
				{ x: 0, y: 0, width: 40, height: 30 },
				{ x: 8, y: 30, width: 24, height: 18 },
			]),
		);

		expect(geometry(screens)).toEqual([
			[0, 0, 40, 30],
			[8, 30, 24, 18],
		]);
	});

	it("should accept one screen per round, recomputing corners in between", () => {
		// The taller right screen hides the left one's bottom-right corner, so
		// the left screen is only proposed once the right one is consumed.
		const screens = detectScreens(
			maskOf(64, 27, [
				{ x: 0, y: 0, width: 32, height: 18 },
				{ x: 32, y: 0, width: 30, height: 27 },
			]),
		);

		expect(geometry(screens)).toEqual([
			[32, 0, 30, 27],
			[0, 0, 32, 18],
		]);
		expect(screens[0].score).toBeCloseTo(364.5);
		expect(screens[1].score).toBe(576);
	});

	it("should merge adjacent screens of equal height", () => {
		const screens = detectScreens(
			maskOf(1600, 600, [
				{ x: 0, y: 0, width: 800, height: 600 },
				{ x: 800, y: 0, width: 800, height: 600 },
			]),
		);

		expect(geometry(screens)).toEqual([[0, 0, 1600, 600]]);
		expect(screens[0].score).toBeCloseTo(180000);
	});

	it("should only count fully written pixels", () => {
		const mask = maskOf(4, 4, [{ x: 0, y: 0, width: 4, height: 4 }]);
		mask.alpha.fill(254, 0, 4);

		expect(geometry(detectScreens(mask))).toEqual([[0, 1, 4, 3]]);
	});

	it("should leave the mask untouched", () => {
		const mask = maskOf(34, 12, [
			{ x: 0, y: 0, width: 16, height: 12 },
			{ x: 18, y: 0, width: 16, height: 12 },
		]);
		const before = Uint8Array.from(mask.alpha);

		expect(detectScreens(mask)).toHaveLength(2);
		expect(mask.alpha).toEqual(before);
	});
});
