/**
 * StreamFrameSource - Fixed-size raw frames from a byte stream
 *
 * Reassembles width * height * channels byte frames from any Readable
 * (an ffmpeg stdout pipe, a raw .rgb file). Chunk boundaries in the
 * stream are irrelevant. At most `maxBufferedFrames` frames are held in
 * memory; beyond that the stream is paused, so a slow consumer pushes
 * back on the producer instead of buffering without limit.
 *
 * A stream that ends on a frame boundary is a clean end of stream. One
 * that ends mid-frame, or emits an error, is a source failure.
 *
 * @module capture/StreamFrameSource
 */

import type { Readable } from 'node:stream';
import { assertFrameShape, frameByteLength, type FrameShape, type RawFrame } from './Frame';
import { SourceFailureError, type FrameSource } from './FrameSource';
import { now } from '$lib/utils/timing';

/**
 * Configuration for a stream source
 */
export interface StreamSourceConfig extends FrameShape {
	/** Frames held before the stream is paused */
	maxBufferedFrames: number;
}

/**
 * Default configuration
 */
export const DEFAULT_STREAM_CONFIG: StreamSourceConfig = {
	width: 160,
	height: 90,
	channels: 3,
	maxBufferedFrames: 2
};

/**
 * Convert a 'data' event payload to bytes
 */
function toBytes(chunk: unknown): Uint8Array {
	if (chunk instanceof Uint8Array) {
		return chunk;
	}
	if (typeof chunk === 'string') {
		return Buffer.from(chunk, 'binary');
	}
	throw new TypeError(`Unsupported stream chunk type: ${typeof chunk}`);
}

/**
 * StreamFrameSource
 *
 * @example
 * ```typescript
 * const source = new StreamFrameSource('camera', ffmpeg.stdout, { width: 160, height: 90 });
 * await source.open();
 * const frame = await source.read();
 * ```
 */
export class StreamFrameSource implements FrameSource {
	readonly name: string;
	private readonly input: Readable | (() => Readable);
	private stream: Readable | null = null;
	private readonly config: StreamSourceConfig;
	private readonly frameBytes: number;

	private chunks: Uint8Array[] = [];
	private buffered = 0;
	private ended = false;
	private failure: SourceFailureError | null = null;
	private notify: (() => void) | null = null;
	private opened = false;
	private closed = false;

	private readonly onData = (chunk: unknown) => {
		try {
			const bytes = toBytes(chunk);
			this.chunks.push(bytes);
			this.buffered += bytes.length;
		} catch (error: unknown) {
			this.fail(error);
		}
		if (this.buffered >= this.frameBytes * this.config.maxBufferedFrames) {
			this.stream?.pause();
		}
		this.wake();
	};

	private readonly onEnd = () => {
		this.ended = true;
		this.wake();
	};

	private readonly onError = (error: Error) => {
		this.fail(error);
	};

	/**
	 * @param name - label used in logs and errors
	 * @param input - the stream, or a factory called by open()
	 */
	constructor(name: string, input: Readable | (() => Readable), config: Partial<StreamSourceConfig> = {}) {
		this.name = name;
		this.input = input;
		this.config = { ...DEFAULT_STREAM_CONFIG, ...config };
		assertFrameShape(this.config);

		if (!Number.isInteger(this.config.maxBufferedFrames) || this.config.maxBufferedFrames < 1) {
			throw new RangeError(`maxBufferedFrames must be a positive integer, got ${this.config.maxBufferedFrames}`);
		}

		this.frameBytes = frameByteLength(this.config);
	}

	/** Bytes currently buffered */
	get bufferedBytes(): number {
		return this.buffered;
	}

	async open(): Promise<FrameShape> {
		if (this.closed) {
			throw new SourceFailureError(this.name, 'source already closed');
		}

		if (!this.opened) {
			const stream = typeof this.input === 'function' ? this.input() : this.input;
			this.stream = stream;
			this.opened = true;
			stream.on('error', this.onError);
			stream.on('data', this.onData);
			stream.once('end', this.onEnd);
		}

		return {
			width: this.config.width,
			height: this.config.height,
			channels: this.config.channels
		};
	}

	async read(signal?: AbortSignal): Promise<RawFrame | null> {
		if (!this.opened) {
			throw new SourceFailureError(this.name, 'read before open()');
		}

		while (this.buffered < this.frameBytes) {
			if (this.failure) {
				throw this.failure;
			}
			if (this.ended || this.closed) {
				if (this.buffered > 0) {
					throw new SourceFailureError(
						this.name,
						`stream ended mid-frame (${this.buffered} of ${this.frameBytes} bytes)`
					);
				}
				return null;
			}
			if (signal?.aborted) {
				return null;
			}

			this.stream?.resume();
			await this.waitForData(signal);
		}

		return {
			width: this.config.width,
			height: this.config.height,
			channels: this.config.channels,
			data: this.takeFrame(),
			timestamp: now()
		};
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;

		// The error listener stays attached so a late error cannot go unhandled
		this.stream?.off('data', this.onData);
		this.stream?.off('end', this.onEnd);
		this.stream?.destroy();

		this.chunks = [];
		this.buffered = 0;
		this.wake();
	}

	private takeFrame(): Uint8ClampedArray {
		const data = new Uint8ClampedArray(this.frameBytes);
		let filled = 0;

		while (filled < this.frameBytes) {
			const head = this.chunks[0];
			const needed = this.frameBytes - filled;

			if (head.length <= needed) {
				data.set(head, filled);
				filled += head.length;
				this.chunks.shift();
			} else {
				data.set(head.subarray(0, needed), filled);
				this.chunks[0] = head.subarray(needed);
				filled += needed;
			}
		}

		this.buffered -= this.frameBytes;
		return data;
	}

	private waitForData(signal?: AbortSignal): Promise<void> {
		return new Promise<void>((resolve) => {
			const done = () => {
				signal?.removeEventListener('abort', done);
				this.notify = null;
				resolve();
			};
			this.notify = done;
			signal?.addEventListener('abort', done, { once: true });
		});
	}

	private wake(): void {
		this.notify?.();
	}

	private fail(error: unknown): void {
		if (this.failure === null) {
			const message = error instanceof Error ? error.message : String(error);
			this.failure = new SourceFailureError(this.name, message, { cause: error });
		}
		this.wake();
	}
}
