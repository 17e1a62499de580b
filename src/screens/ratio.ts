/**
 * Small exact-rational helpers for aspect ratios.
 */

export interface Ratio {
	readonly numerator: number;
	readonly denominator: number;
}

function gcd(a: number, b: number): number {
	let x = Math.abs(a);
	let y = Math.abs(b);
	while (y !== 0) {
		[x, y] = [y, x % y];
	}
	return x;
}

export function ratio(numerator: number, denominator: number): Ratio {
	if (denominator <= 0) {
		throw new RangeError(`Ratio denominator must be positive, got ${denominator}`);
	}
	const divisor = gcd(numerator, denominator) || 1;
	return { numerator: numerator / divisor, denominator: denominator / divisor };
}

export function sameRatio(a: Ratio, b: Ratio): boolean {
	return a.numerator * b.denominator === b.numerator * a.denominator;
}

export function ratioValue(r: Ratio): number {
	return r.numerator / r.denominator;
}

/**
 * Closest fraction to `numerator / denominator` whose denominator is at most
 * `maxDenominator`, found by walking the continued-fraction convergents and
 * then picking the nearer of the last convergent and the best semiconvergent.
 * Ties go to the convergent.
 */
export function limitDenominator(
	numerator: number,
	denominator: number,
	maxDenominator: number,
): Ratio {
	const exact = ratio(numerator, denominator);
	if (exact.denominator <= maxDenominator) return exact;

	let [p0, q0, p1, q1] = [0, 1, 1, 0];
	let n = exact.numerator;
	let d = exact.denominator;
	for (;;) {
		const a = Math.floor(n / d);
		const q2 = q0 + a * q1;
		if (q2 > maxDenominator) break;
		[p0, q0, p1, q1] = [p1, q1, p0 + a * p1, q2];
		[n, d] = [d, n - a * d];
	}

	const k = Math.floor((maxDenominator - q0) / q1);
	const semiconvergent = { numerator: p0 + k * p1, denominator: q0 + k * q1 };
	const convergent = { numerator: p1, denominator: q1 };

	// |p/q - N/D| compared without division: scale both errors by q1 * q2 * D
	const errorOf = (r: Ratio) => Math.abs(r.numerator * exact.denominator - exact.numerator * r.denominator);
	const convergentError = errorOf(convergent) * semiconvergent.denominator;
	const semiconvergentError = errorOf(semiconvergent) * convergent.denominator;

	return convergentError <= semiconvergentError ? convergent : semiconvergent;
}
