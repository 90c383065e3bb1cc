/**
 * SyntheticFrameSource - Generated test pattern, no camera required
 *
 * Produces color bars with a moving checker square at the configured
 * frame rate. Useful for demos on machines without a capture device and
 * as a deterministic source in tests.
 *
 * @module capture/SyntheticFrameSource
 */

import { assertFrameShape, frameByteLength, type FrameShape, type RawFrame } from './Frame';
import type { FrameSource } from './FrameSource';
import { delay, now } from '$lib/utils/timing';

/**
 * Configuration for the synthetic source
 */
export interface SyntheticSourceConfig extends FrameShape {
	/** Frames per second; 0 disables pacing */
	frameRate: number;
	/** Number of frames before end of stream; null for endless */
	frameLimit: number | null;
}

/**
 * Default configuration
 */
export const DEFAULT_SYNTHETIC_CONFIG: SyntheticSourceConfig = {
	width: 160,
	height: 90,
	channels: 3,
	frameRate: 30,
	frameLimit: null
};

/** SMPTE-style bar colors, left to right */
const BARS: ReadonlyArray<readonly [number, number, number]> = [
	[192, 192, 192],
	[192, 192, 0],
	[0, 192, 192],
	[0, 192, 0],
	[192, 0, 192],
	[192, 0, 0],
	[0, 0, 192]
];

/**
 * Render pattern frame `index` into a new buffer
 */
export function renderTestPattern(shape: FrameShape, index: number): Uint8ClampedArray {
	const { width, height, channels } = shape;
	const data = new Uint8ClampedArray(frameByteLength(shape));

	const square = Math.max(4, Math.floor(Math.min(width, height) / 4));
	const travel = Math.max(1, width - square);
	const squareX = index % (2 * travel) < travel ? index % travel : travel - (index % travel);
	const squareY = Math.floor((height - square) / 2);

	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			const offset = (y * width + x) * channels;
			let [r, g, b] = BARS[Math.floor((x * BARS.length) / width)];

			if (y >= Math.floor(height * 0.75)) {
				// Luminance ramp along the bottom quarter
				r = g = b = Math.round((x / Math.max(1, width - 1)) * 255);
			}

			if (x >= squareX && x < squareX + square && y >= squareY && y < squareY + square) {
				const checker = ((x - squareX) >> 2) + ((y - squareY) >> 2);
				r = g = b = checker % 2 === 0 ? 255 : 16;
			}

			data[offset] = r;
			data[offset + 1] = g;
			data[offset + 2] = b;
			if (channels === 4) {
				data[offset + 3] = 255;
			}
		}
	}

	return data;
}

/**
 * SyntheticFrameSource
 *
 * @example
 * ```typescript
 * const source = new SyntheticFrameSource({ width: 64, height: 36, frameLimit: 100 });
 * const shape = await source.open();
 * let frame;
 * while ((frame = await source.read()) !== null) {
 *   // ...
 * }
 * ```
 */
export class SyntheticFrameSource implements FrameSource {
	readonly name = 'synthetic';
	private readonly config: SyntheticSourceConfig;
	private opened = false;
	private produced = 0;
	private nextDue = 0;

	constructor(config: Partial<SyntheticSourceConfig> = {}) {
		this.config = { ...DEFAULT_SYNTHETIC_CONFIG, ...config };
		assertFrameShape(this.config);

		if (!(this.config.frameRate >= 0)) {
			throw new RangeError(`frameRate must be >= 0, got ${this.config.frameRate}`);
		}
	}

	/** Frames produced so far */
	get framesProduced(): number {
		return this.produced;
	}

	async open(): Promise<FrameShape> {
		this.opened = true;
		this.produced = 0;
		this.nextDue = now();
		return {
			width: this.config.width,
			height: this.config.height,
			channels: this.config.channels
		};
	}

	async read(signal?: AbortSignal): Promise<RawFrame | null> {
		if (!this.opened) {
			throw new Error('SyntheticFrameSource read before open()');
		}

		if (this.config.frameLimit !== null && this.produced >= this.config.frameLimit) {
			return null;
		}

		if (this.config.frameRate > 0) {
			const wait = this.nextDue - now();
			await delay(wait, signal);
			this.nextDue = Math.max(this.nextDue, now() - 1000 / this.config.frameRate) + 1000 / this.config.frameRate;
		}

		const data = renderTestPattern(this.config, this.produced);
		this.produced++;

		return {
			width: this.config.width,
			height: this.config.height,
			channels: this.config.channels,
			data,
			timestamp: now()
		};
	}

	async close(): Promise<void> {
		this.opened = false;
	}
}
