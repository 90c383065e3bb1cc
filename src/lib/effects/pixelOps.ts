/**
 * Pixel helpers shared by the effects
 *
 * Everything here allocates its output; inputs are never written.
 *
 * @module effects/pixelOps
 */

import type { FrameShape } from '../capture/Frame';

/**
 * Seeded PRNG (mulberry32), uniform in [0, 1)
 *
 * Effects that scatter features across the frame draw from this so that
 * init() is reproducible for a given seed.
 */
export function createRandom(seed: number): () => number {
	let a = seed >>> 0;
	return () => {
		a = (a + 0x6d2b79f5) >>> 0;
		let t = a;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

/**
 * Linear interpolation
 */
export function mix(a: number, b: number, t: number): number {
	return a + (b - a) * t;
}

/**
 * Hermite step between two edges, 0 below `edge0`, 1 above `edge1`
 */
export function smoothstep(edge0: number, edge1: number, x: number): number {
	if (edge1 === edge0) return x < edge0 ? 0 : 1;
	const t = Math.max(0, Math.min(1, (x - edge0) / (edge1 - edge0)));
	return t * t * (3 - 2 * t);
}

/**
 * Separable box blur with clamped edges
 *
 * Runs one horizontal and one vertical pass with a sliding window sum,
 * so cost is independent of the radius. Radius 0 returns a copy.
 */
export function boxBlur(data: Uint8ClampedArray, shape: FrameShape, radius: number): Uint8ClampedArray {
	const r = Math.max(0, Math.floor(radius));
	if (r === 0) {
		return new Uint8ClampedArray(data);
	}

	const { width, height, channels } = shape;
	const horizontal = new Uint8ClampedArray(data.length);
	const out = new Uint8ClampedArray(data.length);
	const window = 2 * r + 1;

	for (let y = 0; y < height; y++) {
		const row = y * width;
		for (let c = 0; c < channels; c++) {
			let sum = 0;
			for (let k = -r; k <= r; k++) {
				const x = Math.min(width - 1, Math.max(0, k));
				sum += data[(row + x) * channels + c];
			}
			for (let x = 0; x < width; x++) {
				horizontal[(row + x) * channels + c] = Math.round(sum / window);
				const leaving = Math.max(0, x - r);
				const entering = Math.min(width - 1, x + r + 1);
				sum += data[(row + entering) * channels + c] - data[(row + leaving) * channels + c];
			}
		}
	}

	for (let x = 0; x < width; x++) {
		for (let c = 0; c < channels; c++) {
			let sum = 0;
			for (let k = -r; k <= r; k++) {
				const y = Math.min(height - 1, Math.max(0, k));
				sum += horizontal[(y * width + x) * channels + c];
			}
			for (let y = 0; y < height; y++) {
				out[(y * width + x) * channels + c] = Math.round(sum / window);
				const leaving = Math.max(0, y - r);
				const entering = Math.min(height - 1, y + r + 1);
				sum +=
					horizontal[(entering * width + x) * channels + c] -
					horizontal[(leaving * width + x) * channels + c];
			}
		}
	}

	return out;
}

/**
 * Distance of every pixel centre from the frame centre
 *
 * Normalised so the corners sit at 1. Aspect ratio is preserved: a
 * circle in the field stays a circle on screen.
 */
export function radialDistanceField(shape: FrameShape): Float32Array {
	const { width, height } = shape;
	const field = new Float32Array(width * height);
	const cx = width / 2;
	const cy = height / 2;
	const corner = Math.hypot(cx, cy);

	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			field[y * width + x] = Math.hypot(x + 0.5 - cx, y + 0.5 - cy) / corner;
		}
	}
	return field;
}

/**
 * Largest blur radius worth applying at full severity for a frame
 */
export function maxBlurRadius(shape: FrameShape, divisor: number): number {
	return Math.max(1, Math.round(Math.min(shape.width, shape.height) / divisor));
}
