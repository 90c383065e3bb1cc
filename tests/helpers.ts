/**
 * Shared test fixtures: frames, jobs, scripted sources, recording sinks
 */

import { withPixels, type Frame, type FrameShape, type Job, type RawFrame, type Result } from '$lib/capture/Frame';
import type { FrameSource } from '$lib/capture/FrameSource';
import type { PresentInfo, PresentationSink } from '$lib/core/PresentationLoop';
import type { EffectTransform } from '$lib/effects/EffectTransform';
import { delay, now } from '$lib/utils/timing';

export const SMALL_SHAPE: FrameShape = { width: 8, height: 6, channels: 3 };

/**
 * Deterministic pixel data that differs for every sequence number
 */
export function patternData(shape: FrameShape, sequence: number): Uint8ClampedArray {
	const data = new Uint8ClampedArray(shape.width * shape.height * shape.channels);
	for (let i = 0; i < data.length; i++) {
		data[i] = (sequence * 31 + i * 7) % 256;
	}
	return data;
}

export function makeRawFrame(shape: FrameShape = SMALL_SHAPE, sequence = 1): RawFrame {
	return { ...shape, data: patternData(shape, sequence), timestamp: sequence };
}

export function makeFrame(sequence: number, shape: FrameShape = SMALL_SHAPE): Frame {
	return { ...shape, data: patternData(shape, sequence), timestamp: sequence, sequence };
}

export function makeJob(sequence: number, severity = 1, shape: FrameShape = SMALL_SHAPE): Job {
	return { frame: makeFrame(sequence, shape), severity, sequence, enqueuedAt: 0 };
}

export function makeResult(sequence: number, severity = 1): Result {
	return { frame: makeFrame(sequence), sequence, severity, outcome: 'applied', latencyMs: 0 };
}

/**
 * Copies the input pixels into a new frame
 */
export const identityEffect: EffectTransform<null> = {
	id: 'identity',
	label: 'Identity',
	category: 'color',
	init: () => null,
	apply: (frame) => withPixels(frame, new Uint8ClampedArray(frame.data))
};

export const throwingEffect: EffectTransform<null> = {
	id: 'always-throws',
	label: 'Always throws',
	category: 'color',
	init: () => null,
	apply: () => {
		throw new Error('test-failure');
	}
};

/**
 * Fills every byte with round(severity * 200)
 */
export const severityStampEffect: EffectTransform<null> = {
	id: 'severity-stamp',
	label: 'Severity stamp',
	category: 'color',
	init: () => null,
	apply: (frame, severity) =>
		withPixels(frame, new Uint8ClampedArray(frame.data.length).fill(Math.round(severity * 200)))
};

/**
 * Identity effect that takes `ms` (or `ms(sequence)`) milliseconds per frame
 */
export function slowEffect(ms: number | ((sequence: number) => number)): EffectTransform<null> {
	return {
		id: 'slow',
		label: 'Slow',
		category: 'blur',
		init: () => null,
		apply: async (frame) => {
			await delay(typeof ms === 'number' ? ms : ms(frame.sequence));
			return withPixels(frame, new Uint8ClampedArray(frame.data));
		}
	};
}

export interface PresentedFrame {
	sequence: number;
	severity: number;
	repeated: boolean;
	tick: number;
	/** now() when present() was called */
	at: number;
	data: Uint8ClampedArray;
}

/**
 * Sink that records every present call
 */
export class RecordingSink implements PresentationSink {
	readonly presented: PresentedFrame[] = [];
	closed = 0;
	private waiters: Array<{ sequence: number; resolve: () => void }> = [];
	private onPresent: ((info: PresentInfo) => void) | null;

	constructor(onPresent: ((info: PresentInfo) => void) | null = null) {
		this.onPresent = onPresent;
	}

	/** Fresh (non-repeated) presents */
	get fresh(): PresentedFrame[] {
		return this.presented.filter((p) => !p.repeated);
	}

	/** Longest time between two consecutive present() calls, fresh or repeated */
	get maxPresentGap(): number {
		let gap = 0;
		for (let i = 1; i < this.presented.length; i++) {
			gap = Math.max(gap, this.presented[i].at - this.presented[i - 1].at);
		}
		return gap;
	}

	/** Highest fresh sequence shown so far */
	get highestFresh(): number {
		return this.fresh.reduce((max, p) => Math.max(max, p.sequence), 0);
	}

	present(frame: Frame, info: PresentInfo): void {
		this.presented.push({
			sequence: info.sequence,
			severity: info.severity,
			repeated: info.repeated,
			tick: info.tick,
			at: now(),
			data: new Uint8ClampedArray(frame.data)
		});
		this.onPresent?.(info);

		if (!info.repeated) {
			const ready = this.waiters.filter((w) => w.sequence <= info.sequence);
			this.waiters = this.waiters.filter((w) => w.sequence > info.sequence);
			for (const waiter of ready) waiter.resolve();
		}
	}

	close(): void {
		this.closed++;
	}

	/**
	 * Resolve once a fresh frame with sequence >= `sequence` has been presented
	 */
	waitForFresh(sequence: number, signal?: AbortSignal): Promise<void> {
		if (this.highestFresh >= sequence || signal?.aborted) {
			return Promise.resolve();
		}
		return new Promise<void>((resolve) => {
			const waiter = { sequence, resolve };
			this.waiters.push(waiter);
			signal?.addEventListener(
				'abort',
				() => {
					this.waiters = this.waiters.filter((w) => w !== waiter);
					resolve();
				},
				{ once: true }
			);
		});
	}
}

/**
 * Source that hands out `count` frames, waiting before frame k+1 until
 * the sink has presented frame k
 *
 * With the capture loop held back like this, no Job is ever dropped and
 * every frame reaches the display.
 */
export class LockstepSource implements FrameSource {
	readonly name = 'lockstep';
	readonly shape: FrameShape;
	private readonly count: number;
	private readonly sink: RecordingSink;
	private produced = 0;
	closed = 0;

	constructor(sink: RecordingSink, count: number, shape: FrameShape = SMALL_SHAPE) {
		this.sink = sink;
		this.count = count;
		this.shape = shape;
	}

	async open(): Promise<FrameShape> {
		return this.shape;
	}

	async read(signal?: AbortSignal): Promise<RawFrame | null> {
		if (this.produced > 0) {
			await this.sink.waitForFresh(this.produced, signal);
		}
		if (this.produced >= this.count) {
			return null;
		}
		this.produced++;
		return makeRawFrame(this.shape, this.produced);
	}

	async close(): Promise<void> {
		this.closed++;
	}
}

/**
 * Source that delivers frames from a script of entries
 *
 * An Error entry is thrown from read(); null ends the stream.
 */
export class ScriptedSource implements FrameSource {
	readonly name = 'scripted';
	private readonly script: Array<RawFrame | Error | null>;
	private readonly shape: FrameShape;
	private index = 0;
	openError: Error | null = null;
	closed = 0;

	constructor(script: Array<RawFrame | Error | null>, shape: FrameShape = SMALL_SHAPE) {
		this.script = script;
		this.shape = shape;
	}

	async open(): Promise<FrameShape> {
		if (this.openError) throw this.openError;
		return this.shape;
	}

	async read(): Promise<RawFrame | null> {
		const entry = this.index < this.script.length ? this.script[this.index] : null;
		this.index++;
		if (entry instanceof Error) throw entry;
		return entry;
	}

	async close(): Promise<void> {
		this.closed++;
	}
}

/**
 * Source whose read() never resolves until aborted
 */
export class StalledSource implements FrameSource {
	readonly name = 'stalled';
	closed = 0;

	async open(): Promise<FrameShape> {
		return SMALL_SHAPE;
	}

	read(signal?: AbortSignal): Promise<RawFrame | null> {
		return new Promise((resolve) => {
			if (signal?.aborted) return resolve(null);
			signal?.addEventListener('abort', () => resolve(null), { once: true });
		});
	}

	async close(): Promise<void> {
		this.closed++;
	}
}

/**
 * Poll `predicate` until it holds
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 3000): Promise<void> {
	const deadline = Date.now() + timeoutMs;
	while (!predicate()) {
		if (Date.now() > deadline) {
			throw new Error('waitFor timed out');
		}
		await delay(2);
	}
}
