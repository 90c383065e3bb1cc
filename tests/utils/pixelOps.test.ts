/**
 * pixelOps Tests
 */

import { describe, it, expect } from 'vitest';
import { boxBlur, createRandom, maxBlurRadius, mix, radialDistanceField, smoothstep } from '$lib/effects/pixelOps';

describe('createRandom', () => {
	it('should repeat its sequence for the same seed', () => {
		const a = createRandom(42);
		const b = createRandom(42);

		expect([a(), a(), a()]).toEqual([b(), b(), b()]);
	});

	it('should stay in [0, 1)', () => {
		const random = createRandom(7);
		for (let i = 0; i < 1000; i++) {
			const value = random();
			expect(value).toBeGreaterThanOrEqual(0);
			expect(value).toBeLessThan(1);
		}
	});

	it('should differ between seeds', () => {
		expect(createRandom(1)()).not.toBe(createRandom(2)());
	});
});

describe('mix and smoothstep', () => {
	it('should interpolate linearly', () => {
		expect(mix(10, 20, 0)).toBe(10);
		expect(mix(10, 20, 0.5)).toBe(15);
		expect(mix(10, 20, 1)).toBe(20);
	});

	it('should clamp outside the edges and ease between them', () => {
		expect(smoothstep(0, 1, -1)).toBe(0);
		expect(smoothstep(0, 1, 2)).toBe(1);
		expect(smoothstep(0, 1, 0.5)).toBe(0.5);
		expect(smoothstep(0, 1, 0.25)).toBeCloseTo(0.15625, 10);
	});

	it('should step when both edges coincide', () => {
		expect(smoothstep(0.5, 0.5, 0.4)).toBe(0);
		expect(smoothstep(0.5, 0.5, 0.5)).toBe(1);
	});
});

describe('boxBlur', () => {
	it('should average a row with clamped edges', () => {
		const data = new Uint8ClampedArray([0, 0, 0, 90, 0, 0, 180, 0, 0]);

		const out = boxBlur(data, { width: 3, height: 1, channels: 3 }, 1);

		expect(Array.from(out)).toEqual([30, 0, 0, 90, 0, 0, 150, 0, 0]);
	});

	it('should return a copy for radius 0', () => {
		const data = new Uint8ClampedArray([1, 2, 3]);

		const out = boxBlur(data, { width: 1, height: 1, channels: 3 }, 0.7);

		expect(out).toEqual(data);
		expect(out).not.toBe(data);
	});

	it('should leave a uniform image unchanged', () => {
		const shape = { width: 9, height: 7, channels: 4 as const };
		const data = new Uint8ClampedArray(9 * 7 * 4).fill(123);

		expect(boxBlur(data, shape, 3)).toEqual(data);
	});

	it('should handle a radius larger than the image', () => {
		const data = new Uint8ClampedArray([0, 0, 0, 255, 255, 255]);

		const out = boxBlur(data, { width: 2, height: 1, channels: 3 }, 5);

		expect(out.length).toBe(6);
		expect(out[0]).toBeGreaterThan(0);
		expect(out[3]).toBeLessThan(255);
	});
});

describe('radialDistanceField', () => {
	it('should be symmetric about the centre', () => {
		expect(Array.from(radialDistanceField({ width: 2, height: 2, channels: 3 }))).toEqual([0.5, 0.5, 0.5, 0.5]);
	});

	it('should grow towards the corners and stay below 1', () => {
		const field = radialDistanceField({ width: 10, height: 6, channels: 3 });

		expect(field[0]).toBeGreaterThan(field[2 * 10 + 4]);
		expect(Math.max(...field)).toBeLessThan(1);
	});
});

describe('maxBlurRadius', () => {
	it('should scale with the shorter side', () => {
		expect(maxBlurRadius({ width: 96, height: 54, channels: 3 }, 24)).toBe(2);
		expect(maxBlurRadius({ width: 480, height: 270, channels: 3 }, 12)).toBe(23);
	});

	it('should never drop below 1', () => {
		expect(maxBlurRadius({ width: 4, height: 4, channels: 3 }, 40)).toBe(1);
	});
});
