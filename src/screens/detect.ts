// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Physical screen detection from a framebuffer's written-pixel mask.
 *
 * A multi-monitor server reports one framebuffer covering the bounding box of
 * all monitors; only the monitors' areas are ever painted. Convex corners of
 * the painted area are found with 2x2 difference tests, any three aligned
 * corners propose a rectangle, and proposals are accepted greedily by score
 * as long as they are still entirely painted in a working copy of the mask.
 */

import type { AlphaMask } from "../vnc/types.js";
import { Screen } from "./screen.js";

/** Grid point between pixels: `row` and `col` range over 0..height and 0..width */
interface Corner {
	readonly row: number;
	readonly col: number;
}

interface Corners {
	readonly topLeft: Corner[];
	readonly topRight: Corner[];
	readonly bottomLeft: Corner[];
	readonly bottomRight: Corner[];
}

/** A 0/1 occupancy grid that reads as 0 outside its bounds. */
class Occupancy {
	constructor(
		readonly width: number,
		readonly height: number,
		readonly cells: Uint8Array,
	) {}

	static fromAlpha(mask: AlphaMask): Occupancy {
		const cells = new Uint8Array(mask.width * mask.height);
		for (let i = 0; i < cells.length; i++) {
			cells[i] = mask.alpha[i] === 255 ? 1 : 0;
		}
		return new Occupancy(mask.width, mask.height, cells);
	}

	at(row: number, col: number): number {
		if (row < 0 || col < 0 || row >= this.height || col >= this.width) return 0;
		return this.cells[row * this.width + col];
	}

	isFilled(screen: Screen): boolean {
		for (let row = screen.y; row < screen.y + screen.height; row++) {
			const start = row * this.width + screen.x;
			for (let i = start; i < start + screen.width; i++) {
				if (this.cells[i] !== 1) return false;
			}
		}
		return true;
	}

	clear(screen: Screen): void {
		for (let row = screen.y; row < screen.y + screen.height; row++) {
			const start = row * this.width + screen.x;
			this.cells.fill(0, start, start + screen.width);
		}
	}
}

/**
 * Classify every grid point by its 2x2 neighbourhood. With `cur` the cell
 * below-right of the point, `left`, `up` and `upLeft` its neighbours, a
 * corner is a point where two perpendicular first differences are both -1,
 * e.g. top-left when (left - cur) & (up - cur) === -1.
 */
function findCorners(grid: Occupancy): Corners {
	const corners: Corners = { topLeft: [], topRight: [], bottomLeft: [], bottomRight: [] };

	for (let row = 0; row <= grid.height; row++) {
		for (let col = 0; col <= grid.width; col++) {
			const cur = grid.at(row, col);
			const left = grid.at(row, col - 1);
			const up = grid.at(row - 1, col);
			const upLeft = grid.at(row - 1, col - 1);

			if (((left - cur) & (up - cur)) === -1) corners.topLeft.push({ row, col });
			if (((cur - left) & (upLeft - left)) === -1) corners.topRight.push({ row, col });
			if (((upLeft - up) & (cur - up)) === -1) corners.bottomLeft.push({ row, col });
			if (((up - upLeft) & (left - upLeft)) === -1) corners.bottomRight.push({ row, col });
		}
	}

	return corners;
}

/**
 * Rectangles implied by every (top-left, top-right, bottom-left,
 * bottom-right) combination with a horizontal edge and a vertical edge in
 * common, so three corners suffice. Every such edge pair contributes its own
 * rectangle. Pairs are matched directly instead of walking the four-way
 * product, but nothing is proposed unless all four corner classes are
 * non-empty.
 */
function candidateScreens({ topLeft, topRight, bottomLeft, bottomRight }: Corners): Screen[] {
	if (!topLeft.length || !topRight.length || !bottomLeft.length || !bottomRight.length) {
		return [];
	}

	const rects = new Map<string, Screen>();
	const add = (x0: number, y0: number, x1: number, y1: number) => {
		const key = `${x0},${y0},${x1},${y1}`;
		if (!rects.has(key)) {
			rects.set(key, new Screen(x0, y0, x1 - x0, y1 - y0));
		}
	};

	const sameRow = (p: Corner, q: Corner) => p.row === q.row && p.col < q.col;
	const sameCol = (p: Corner, q: Corner) => p.col === q.col && p.row < q.row;

	for (const a of topLeft) {
		const below = bottomLeft.filter((c) => sameCol(a, c));
		for (const b of topRight) {
			if (!sameRow(a, b)) continue;
			// top + left edges
			for (const c of below) add(a.col, a.row, b.col, c.row);
			// top + right edges
			for (const d of bottomRight) {
				if (sameCol(b, d)) add(a.col, a.row, d.col, d.row);
			}
		}
		// bottom + left edges
		for (const c of below) {
			for (const d of bottomRight) {
				if (sameRow(c, d)) add(a.col, a.row, d.col, d.row);
			}
		}
	}

	// bottom + right edges
	for (const c of bottomLeft) {
		for (const d of bottomRight) {
			if (!sameRow(c, d)) continue;
			for (const b of topRight) {
				if (sameCol(b, d)) add(c.col, b.row, d.col, d.row);
			}
		}
	}

	return [...rects.values()];
}

interface Scored {
	readonly screen: Screen;
	readonly score: number;
}

function byScore(a: Scored, b: Scored): number {
	return (
		b.score - a.score ||
		a.screen.y - b.screen.y ||
		a.screen.x - b.screen.x ||
		b.screen.area - a.screen.area
	);
}

/**
 * Find the screens painted into `mask`, best first. The mask is not modified.
 * An empty mask, or one without a usable corner combination, yields [].
 */
export function detectScreens(mask: AlphaMask): Screen[] {
	const grid = Occupancy.fromAlpha(mask);
	const screens: Screen[] = [];

	for (;;) {
		const candidates = candidateScreens(findCorners(grid))
			.map((screen) => ({ screen, score: screen.score }))
			.sort(byScore);

		const accepted = candidates.find(({ screen }) => grid.isFilled(screen));
		if (!accepted) {
			return screens;
		}

		grid.clear(accepted.screen);
		screens.push(accepted.screen);
	}
}
