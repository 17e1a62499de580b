import { describe, expect, it } from "vitest";
import { limitDenominator, ratio, ratioValue, sameRatio } from "../../src/screens/ratio.js";

describe("ratio", () => {
	it("should reduce to lowest terms", () => {
		expect(ratio(1920, 1080)).toEqual({ numerator: 16, denominator: 9 });
		expect(ratio(0, 5)).toEqual({ numerator: 0, denominator: 1 });
	});

	it("should reject non-positive denominators", () => {
		expect(() => ratio(1, 0)).toThrow(RangeError);
	});

	it("should compare by value", () => {
		expect(sameRatio(ratio(16, 10), ratio(8, 5))).toBe(true);
		expect(sameRatio(ratio(16, 9), ratio(9, 16))).toBe(false);
		expect(ratioValue(ratio(3, 4))).toBe(0.75);
	});
});

describe("limitDenominator", () => {
	it("should keep fractions that already fit", () => {
		expect(limitDenominator(1600, 600, 64)).toEqual({ numerator: 8, denominator: 3 });
		expect(limitDenominator(2560, 1080, 64)).toEqual({ numerator: 64, denominator: 27 });
	});

	it("should snap near-standard resolutions", () => {
		expect(limitDenominator(1366, 768, 64)).toEqual({ numerator: 16, denominator: 9 });
		expect(limitDenominator(768, 1366, 64)).toEqual({ numerator: 9, denominator: 16 });
	});

	it("should pick the closest convergent", () => {
		expect(limitDenominator(1000, 333, 64)).toEqual({ numerator: 3, denominator: 1 });
		expect(limitDenominator(3, 1000, 64)).toEqual({ numerator: 0, denominator: 1 });
	});

	it("should pick a semiconvergent when it is closer", () => {
		expect(limitDenominator(314159, 100000, 64)).toEqual({ numerator: 201, denominator: 64 });
	});
});
