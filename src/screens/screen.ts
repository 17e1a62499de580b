/**
 * A rectangular region of the framebuffer believed to be one physical monitor.
 */

import type { Framebuffer, Rect } from "../vnc/types.js";
import { type Ratio, limitDenominator, ratio, ratioValue, sameRatio } from "./ratio.js";

/** Common monitor aspect ratios */
export const SCREEN_RATIOS: readonly Ratio[] = [
	ratio(3, 2),
	ratio(4, 3),
	ratio(16, 10),
	ratio(16, 9),
	ratio(32, 9),
	ratio(64, 27),
];

const MAX_RATIO_DENOMINATOR = 64;

export class Screen implements Rect {
	constructor(
		readonly x: number,
		readonly y: number,
		readonly width: number,
		readonly height: number,
	) {
		for (const [key, value] of Object.entries({ x, y, width, height })) {
			if (!Number.isInteger(value) || value < 0) {
				throw new RangeError(`Screen ${key} must be a non-negative integer, got ${value}`);
			}
		}
	}

	/**
	 * Confidence that this is a real screen. Proportional to the area for
	 * standard aspect ratios; otherwise also multiplied by half of the
	 * (approximated) ratio or its reciprocal, whichever is smaller.
	 */
	get score(): number {
		if (this.width === 0 || this.height === 0) return 0;

		const value = this.width * this.height;
		const wide = limitDenominator(this.width, this.height, MAX_RATIO_DENOMINATOR);
		const tall = limitDenominator(this.height, this.width, MAX_RATIO_DENOMINATOR);
		const standard = SCREEN_RATIOS.some((known) => sameRatio(known, wide) || sameRatio(known, tall));
		if (standard) return value;
		return value * (Math.min(ratioValue(wide), ratioValue(tall)) * 0.5);
	}

	get area(): number {
		return this.width * this.height;
	}

	/** Copy of this screen's pixels out of an RGBA framebuffer. */
	crop(fb: Framebuffer): Framebuffer {
		if (this.x + this.width > fb.width || this.y + this.height > fb.height) {
			throw new RangeError(
				`Screen ${this.width}x${this.height}+${this.x}+${this.y} lies outside ${fb.width}x${fb.height} framebuffer`,
			);
		}
		const rowBytes = this.width * 4;
		const pixels = new Uint8Array(rowBytes * this.height);
		for (let row = 0; row < this.height; row++) {
			const src = ((this.y + row) * fb.width + this.x) * 4;
			pixels.set(fb.pixels.subarray(src, src + rowBytes), row * rowBytes);
		}
		return { width: this.width, height: this.height, pixels };
	}

	toJSON(): Rect & { score: number } {
		return { x: this.x, y: this.y, width: this.width, height: this.height, score: this.score };
	}
}
