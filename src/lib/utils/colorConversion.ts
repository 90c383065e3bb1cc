/**
 * Color conversion utilities for sRGB ↔ linear RGB
 *
 * Color-matrix effects must run on linear light; gamma-encoded bytes
 * are converted through a 256-entry table on the way in and the exact
 * transfer function on the way out.
 */

/**
 * sRGB transfer function, decoded component in [0, 1] → linear [0, 1]
 */
export function srgbToLinear(c: number): number {
	return c <= 0.04045 ? c / 12.92 : Math.pow((c + 0.055) / 1.055, 2.4);
}

/**
 * Inverse sRGB transfer function, linear [0, 1] → encoded [0, 1]
 *
 * Out-of-gamut input is clamped.
 */
export function linearToSrgb(c: number): number {
	c = Math.max(0, Math.min(1, c));
	return c <= 0.0031308 ? 12.92 * c : 1.055 * Math.pow(c, 1 / 2.4) - 0.055;
}

/**
 * Table of srgbToLinear for every byte value
 */
export function buildLinearTable(): Float32Array {
	const table = new Float32Array(256);
	for (let i = 0; i < 256; i++) {
		table[i] = srgbToLinear(i / 255);
	}
	return table;
}

/**
 * Encode a linear component as an sRGB byte
 */
export function linearToSrgbByte(c: number): number {
	return Math.round(linearToSrgb(c) * 255);
}
