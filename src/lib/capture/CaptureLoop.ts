/**
 * CaptureLoop - Pulls frames from a FrameSource into the inbound queue
 *
 * One iteration: read a frame (the only place this loop waits), tag it
 * with the next sequence number, sample the severity, push the Job.
 * A full inbound queue sheds the Job silently; the loop never waits on
 * a worker.
 *
 * End of stream and source errors are terminal: the loop closes the
 * inbound queue so the workers drain what is left and exit. On
 * cancellation the queued Jobs are discarded instead.
 *
 * @module capture/CaptureLoop
 */

import { createFrame, sameShape, type FrameShape, type Job } from './Frame';
import { toSourceFailure, type FrameSource } from './FrameSource';
import type { BoundedFrameQueue } from '$lib/core/BoundedFrameQueue';
import type { PipelineDiagnostics } from '$lib/core/PipelineDiagnostics';
import type { CaptureOutcome, StageState } from '$lib/core/types';
import type { SeverityParameter } from '$lib/stores/severityStore';
import { now, yieldToEventLoop } from '$lib/utils/timing';

export class CaptureLoop {
	private readonly source: FrameSource;
	private readonly shape: FrameShape;
	private readonly inbound: BoundedFrameQueue<Job>;
	private readonly severity: SeverityParameter;
	private readonly diagnostics: PipelineDiagnostics;
	private _state: StageState = 'idle';
	private sequence = 0;

	/**
	 * @param shape - shape reported by source.open(); every frame must match it
	 */
	constructor(
		source: FrameSource,
		shape: FrameShape,
		inbound: BoundedFrameQueue<Job>,
		severity: SeverityParameter,
		diagnostics: PipelineDiagnostics
	) {
		this.source = source;
		this.shape = shape;
		this.inbound = inbound;
		this.severity = severity;
		this.diagnostics = diagnostics;
	}

	get state(): StageState {
		return this._state;
	}

	/** Sequence number of the most recent frame read (0 before the first) */
	get lastSequence(): number {
		return this.sequence;
	}

	/**
	 * Run until the source ends, fails, or `signal` aborts
	 */
	async run(signal: AbortSignal): Promise<CaptureOutcome> {
		if (this._state !== 'idle') {
			throw new Error('CaptureLoop can only run once');
		}
		this._state = 'running';

		let outcome: CaptureOutcome = { reason: 'cancelled' };
		try {
			outcome = await this.loop(signal);
			return outcome;
		} finally {
			this._state = 'draining';
			if (outcome.reason === 'cancelled') {
				this.inbound.clear();
			}
			this.inbound.close();
			this._state = 'stopped';
			this.diagnostics.recordStageStopped('capture', 0);
		}
	}

	private async loop(signal: AbortSignal): Promise<CaptureOutcome> {
		while (!signal.aborted) {
			let job: Job | null;
			try {
				job = await this.next(signal);
			} catch (error: unknown) {
				if (signal.aborted) {
					break;
				}
				const failure = toSourceFailure(this.source.name, error);
				console.error('[CaptureLoop] Source failed:', failure.message);
				this.diagnostics.recordSourceFailure(failure.message);
				return { reason: 'source-failure', error: failure };
			}

			// A frame that arrives after cancellation is not enqueued
			if (signal.aborted) {
				break;
			}

			if (job === null) {
				console.log(`[CaptureLoop] ${this.source.name} exhausted after ${this.sequence} frames`);
				return { reason: 'source-exhausted' };
			}

			const admitted = this.inbound.push(job);
			this.diagnostics.recordCapture(admitted);

			await yieldToEventLoop();
		}

		return { reason: 'cancelled' };
	}

	private async next(signal: AbortSignal): Promise<Job | null> {
		const raw = await this.source.read(signal);
		if (raw === null) {
			return null;
		}

		if (!sameShape(raw, this.shape)) {
			throw new Error(
				`Frame shape changed mid-session: ${raw.width}x${raw.height}x${raw.channels}, expected ${this.shape.width}x${this.shape.height}x${this.shape.channels}`
			);
		}

		this.sequence++;
		const frame = createFrame(raw, this.sequence);

		return {
			frame,
			severity: this.severity.get(),
			sequence: frame.sequence,
			enqueuedAt: now()
		};
	}
}
