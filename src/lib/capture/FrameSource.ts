/**
 * FrameSource - Contract for anything that produces raw frames on demand
 *
 * Sources have no concurrency of their own. The capture loop calls
 * read() repeatedly; read() may take as long as the device needs to
 * deliver the next frame.
 *
 * @module capture/FrameSource
 */

import type { FrameShape, RawFrame } from './Frame';

/**
 * Best-effort capture request
 */
export interface FrameSourceConfig {
	/** Capture device index (camera sources) */
	device: number;
	/** File path (file sources) */
	path: string | null;
	/** Requested frame width in pixels */
	width: number;
	/** Requested frame height in pixels */
	height: number;
	/** Requested frames per second */
	frameRate: number;
	/** Channels per pixel delivered to the pipeline */
	channels: 3 | 4;
}

/**
 * Default source configuration
 */
export const DEFAULT_SOURCE_CONFIG: FrameSourceConfig = {
	device: 0,
	path: null,
	width: 160,
	height: 90,
	frameRate: 30,
	channels: 3
};

/**
 * A frame producer
 */
export interface FrameSource {
	/** Short label for logs */
	readonly name: string;

	/**
	 * Acquire the device or file
	 *
	 * @returns the shape every subsequent frame will have
	 * @throws SourceFailureError if the source cannot be opened
	 */
	open(): Promise<FrameShape>;

	/**
	 * Deliver the next frame
	 *
	 * @returns the frame, or null at end of stream
	 * @throws SourceFailureError on a device or file error
	 */
	read(signal?: AbortSignal): Promise<RawFrame | null>;

	/** Release the device or file. Safe to call more than once. */
	close(): Promise<void>;
}

/**
 * Terminal device or file error
 *
 * The original error is kept as `cause`.
 */
export class SourceFailureError extends Error {
	readonly source: string;

	constructor(source: string, message: string, options?: { cause?: unknown }) {
		super(`${source}: ${message}`, options);
		this.name = 'SourceFailureError';
		this.source = source;
	}
}

/**
 * Wrap anything thrown by a source into a SourceFailureError
 */
export function toSourceFailure(source: string, error: unknown): SourceFailureError {
	if (error instanceof SourceFailureError) {
		return error;
	}
	const message = error instanceof Error ? error.message : String(error);
	return new SourceFailureError(source, message, { cause: error });
}
