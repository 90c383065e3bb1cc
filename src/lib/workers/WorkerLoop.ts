/**
 * WorkerLoop - Applies the active effect to queued Jobs
 *
 * Polls the inbound queue with a short timeout, runs the effect with the
 * severity sampled at capture, and publishes into the outbound slot.
 * The loop itself lives on the event loop; the effect runs wherever its
 * EffectRunner puts it (a worker thread for loadable effects).
 *
 * Guarantees:
 * - Severity below `severityEpsilon` skips the effect and forwards the
 *   input frame unchanged (passthrough). This holds for every effect.
 * - An effect that throws or rejects, or whose thread dies, never stops
 *   the loop. The Job's frame is published unprocessed and the failure
 *   is recorded.
 * - On cancellation the in-flight Job is finished and published; queued
 *   Jobs are discarded. Only complete effect output is ever published.
 * - On source end (queue closed) the remaining Jobs are drained first.
 *
 * @module workers/WorkerLoop
 */

import { withPixels, type Frame, type Job, type Result, type ResultOutcome } from '$lib/capture/Frame';
import type { BoundedFrameQueue } from '$lib/core/BoundedFrameQueue';
import type { LatestResultSlot } from '$lib/core/LatestResultSlot';
import type { PipelineDiagnostics } from '$lib/core/PipelineDiagnostics';
import type { StageState } from '$lib/core/types';
import type { AnyEffectTransform } from '$lib/effects/EffectTransform';
import { now, yieldToEventLoop } from '$lib/utils/timing';
import { createEffectRunner, type EffectIsolation, type EffectRunner } from './EffectRunner';

/**
 * Configuration for a worker
 */
export interface WorkerLoopConfig {
	/** tryPop timeout in milliseconds */
	pollIntervalMs: number;
	/** Severities below this skip the effect */
	severityEpsilon: number;
	/** Log the first transform failure and every Nth after it */
	failureLogInterval: number;
	/** 'thread' runs loadable effects on a worker thread; 'inline' keeps every effect on the event loop */
	isolation: EffectIsolation;
}

/**
 * Default worker configuration
 */
export const DEFAULT_WORKER_CONFIG: WorkerLoopConfig = {
	pollIntervalMs: 20,
	severityEpsilon: 1e-3,
	failureLogInterval: 100,
	isolation: 'thread'
};

export class WorkerLoop {
	readonly id: number;
	private readonly effect: AnyEffectTransform;
	private readonly inbound: BoundedFrameQueue<Job>;
	private readonly outbound: LatestResultSlot<Result>;
	private readonly diagnostics: PipelineDiagnostics;
	private readonly config: WorkerLoopConfig;
	private readonly runner: EffectRunner;
	private _state: StageState = 'idle';
	private failures = 0;
	private jobsProcessed = 0;

	constructor(
		id: number,
		effect: AnyEffectTransform,
		inbound: BoundedFrameQueue<Job>,
		outbound: LatestResultSlot<Result>,
		diagnostics: PipelineDiagnostics,
		config: Partial<WorkerLoopConfig> = {}
	) {
		this.id = id;
		this.effect = effect;
		this.inbound = inbound;
		this.outbound = outbound;
		this.diagnostics = diagnostics;
		this.config = { ...DEFAULT_WORKER_CONFIG, ...config };
		this.runner = createEffectRunner(id, effect, this.config.isolation);
	}

	get state(): StageState {
		return this._state;
	}

	/** Where the effect runs */
	get isolation(): EffectIsolation {
		return this.runner.mode;
	}

	/** Jobs this worker has finished */
	get processedCount(): number {
		return this.jobsProcessed;
	}

	/**
	 * Run until the inbound queue is closed and drained, or `signal` aborts
	 */
	async run(signal: AbortSignal): Promise<void> {
		if (this._state !== 'idle') {
			throw new Error(`WorkerLoop ${this.id} can only run once`);
		}
		this._state = 'running';

		try {
			while (!signal.aborted) {
				if (this.inbound.isClosed) {
					this._state = 'draining';
				}

				const job = await this.inbound.tryPop(this.config.pollIntervalMs, signal);
				if (job === null) {
					if (this.inbound.isClosed && this.inbound.size === 0) {
						break;
					}
					continue;
				}

				const result = await this.process(job);
				const replaced = this.outbound.hasPending;
				const published = this.outbound.publish(result);
				this.diagnostics.recordSlotOutcome(published, published && replaced);

				await yieldToEventLoop();
			}
		} finally {
			this._state = 'draining';
			if (signal.aborted) {
				this.inbound.clear();
			}
			try {
				await this.runner.close();
			} catch (error: unknown) {
				const message = error instanceof Error ? error.message : String(error);
				console.warn(`[WorkerLoop ${this.id}] Failed to stop effect runner:`, message);
			}
			this._state = 'stopped';
			this.diagnostics.recordStageStopped('worker', this.id);
		}
	}

	/**
	 * Turn one Job into a Result. Never throws.
	 */
	async process(job: Job): Promise<Result> {
		const startTime = now();
		let frame: Frame = job.frame;
		let outcome: ResultOutcome;

		if (job.severity < this.config.severityEpsilon) {
			outcome = 'passthrough';
		} else {
			try {
				const output = await this.runner.apply(job.frame, job.severity);
				frame = output === job.frame ? output : withPixels(job.frame, output.data);
				outcome = 'applied';
			} catch (error: unknown) {
				frame = job.frame;
				outcome = 'failed';
				this.reportFailure(job, error);
			}
		}

		const latencyMs = now() - startTime;
		this.jobsProcessed++;
		this.diagnostics.recordJob(outcome, latencyMs);

		return {
			frame,
			sequence: job.sequence,
			severity: job.severity,
			outcome,
			latencyMs
		};
	}

	private reportFailure(job: Job, error: unknown): void {
		const message = error instanceof Error ? error.message : String(error);
		this.failures++;
		this.diagnostics.recordTransformFailure(job.sequence, this.id, message);

		if (this.failures === 1 || this.failures % this.config.failureLogInterval === 0) {
			console.warn(
				`[WorkerLoop ${this.id}] ${this.effect.id} failed on frame ${job.sequence} (${this.failures} failures so far):`,
				message
			);
		}
	}
}
