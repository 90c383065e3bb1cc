/**
 * Frame - Pixel data model shared by every pipeline stage
 *
 * A frame is produced once (by a source or an effect) and never mutated
 * afterwards. Stages that change pixels allocate a new frame, so a frame
 * can be handed from capture buffer to queue slot to presentation surface
 * without copying.
 *
 * @module capture/Frame
 */

/**
 * Fixed geometry of every frame in a session
 */
export interface FrameShape {
	/** Frame width in pixels */
	width: number;
	/** Frame height in pixels */
	height: number;
	/** Interleaved channels per pixel (3 = RGB, 4 = RGBA) */
	channels: 3 | 4;
}

/**
 * Frame as delivered by a FrameSource, before the pipeline tags it
 */
export interface RawFrame extends FrameShape {
	/** Row-major interleaved pixel data, width * height * channels bytes */
	data: Uint8ClampedArray;
	/** Capture time in milliseconds (performance.now() clock) */
	timestamp: number;
}

/**
 * Immutable, sequence-tagged frame
 */
export interface Frame {
	readonly width: number;
	readonly height: number;
	readonly channels: 3 | 4;
	readonly data: Uint8ClampedArray;
	readonly timestamp: number;
	/** Monotonically increasing, assigned by the capture loop (first frame is 1) */
	readonly sequence: number;
}

/**
 * One frame plus the severity sampled when it was enqueued
 */
export interface Job {
	readonly frame: Frame;
	readonly severity: number;
	readonly sequence: number;
	readonly enqueuedAt: number;
}

/**
 * How a worker produced a result
 * - applied: effect ran
 * - passthrough: severity below epsilon, effect skipped
 * - failed: effect threw, source frame forwarded unmodified
 */
export type ResultOutcome = 'applied' | 'passthrough' | 'failed';

/**
 * Processed output of one Job
 */
export interface Result {
	readonly frame: Frame;
	readonly sequence: number;
	readonly severity: number;
	readonly outcome: ResultOutcome;
	/** Time from pop to publish in milliseconds */
	readonly latencyMs: number;
}

/**
 * Number of bytes a frame of the given shape occupies
 */
export function frameByteLength(shape: FrameShape): number {
	return shape.width * shape.height * shape.channels;
}

/**
 * Validate a frame shape, throwing RangeError on nonsense dimensions
 */
export function assertFrameShape(shape: FrameShape): void {
	if (!Number.isInteger(shape.width) || shape.width <= 0) {
		throw new RangeError(`Frame width must be a positive integer, got ${shape.width}`);
	}
	if (!Number.isInteger(shape.height) || shape.height <= 0) {
		throw new RangeError(`Frame height must be a positive integer, got ${shape.height}`);
	}
	if (shape.channels !== 3 && shape.channels !== 4) {
		throw new RangeError(`Frame channels must be 3 or 4, got ${String(shape.channels)}`);
	}
}

/**
 * Whether two shapes describe the same geometry
 */
export function sameShape(a: FrameShape, b: FrameShape): boolean {
	return a.width === b.width && a.height === b.height && a.channels === b.channels;
}

/**
 * Tag a raw frame with its sequence number
 *
 * @throws RangeError if the data length does not match the declared shape
 */
export function createFrame(raw: RawFrame, sequence: number): Frame {
	const expected = frameByteLength(raw);
	if (raw.data.length !== expected) {
		throw new RangeError(
			`Frame data has ${raw.data.length} bytes, expected ${expected} for ${raw.width}x${raw.height}x${raw.channels}`
		);
	}

	return {
		width: raw.width,
		height: raw.height,
		channels: raw.channels,
		data: raw.data,
		timestamp: raw.timestamp,
		sequence
	};
}

/**
 * Build a new frame carrying `source`'s identity with different pixels
 *
 * Effects use this to return their output; the source frame is left intact.
 */
export function withPixels(source: Frame, data: Uint8ClampedArray): Frame {
	if (data.length !== source.data.length) {
		throw new RangeError(
			`Replacement pixel buffer has ${data.length} bytes, expected ${source.data.length}`
		);
	}

	return {
		width: source.width,
		height: source.height,
		channels: source.channels,
		data,
		timestamp: source.timestamp,
		sequence: source.sequence
	};
}
