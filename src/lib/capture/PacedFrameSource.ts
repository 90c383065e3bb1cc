/**
 * PacedFrameSource - Limits another source to a fixed frame rate
 *
 * Raw files can be read far faster than real time. Wrapping them here
 * makes them behave like a camera, so the pipeline's load shedding is
 * exercised the way it is live.
 *
 * @module capture/PacedFrameSource
 */

import type { FrameShape, RawFrame } from './Frame';
import type { FrameSource } from './FrameSource';
import { delay, now } from '$lib/utils/timing';

export class PacedFrameSource implements FrameSource {
	readonly name: string;
	private readonly inner: FrameSource;
	private readonly interval: number;
	private nextDue = 0;

	constructor(inner: FrameSource, frameRate: number) {
		if (!(frameRate > 0) || !Number.isFinite(frameRate)) {
			throw new RangeError(`frameRate must be a positive number, got ${frameRate}`);
		}
		this.inner = inner;
		this.name = inner.name;
		this.interval = 1000 / frameRate;
	}

	async open(): Promise<FrameShape> {
		const shape = await this.inner.open();
		this.nextDue = now();
		return shape;
	}

	async read(signal?: AbortSignal): Promise<RawFrame | null> {
		await delay(this.nextDue - now(), signal);
		if (signal?.aborted) {
			return null;
		}

		// Never let a stall turn into a burst of catch-up frames
		this.nextDue = Math.max(this.nextDue + this.interval, now());
		return this.inner.read(signal);
	}

	close(): Promise<void> {
		return this.inner.close();
	}
}
