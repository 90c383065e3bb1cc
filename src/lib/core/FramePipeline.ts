/**
 * FramePipeline - Capture, effect workers and presentation wired together
 *
 *   FrameSource → CaptureLoop → inbound queue → WorkerLoop(s) → outbound slot → PresentationLoop → sink
 *
 * The three stages are independent async loops on the event loop. Each
 * waits only at its own poll point (source read, queue pop, slot take).
 * Effect compute runs on one worker thread per WorkerLoop, so a slow
 * effect degrades the display to repeating its last frame instead of
 * stalling capture or freezing the screen.
 *
 * One AbortController cancels everything. The source and sink are
 * released only after every loop has stopped.
 *
 * @example
 * ```typescript
 * const pipeline = new FramePipeline({
 *   source: new SyntheticFrameSource({ width: 160, height: 90 }),
 *   effect: glaucomaEffect,
 *   sink: new TerminalSurface(process.stdout),
 *   severity
 * });
 *
 * const outcome = await pipeline.run();
 * console.log(outcome.reason, outcome.diagnostics.dropRate);
 * ```
 *
 * @module core/FramePipeline
 */

import type { FrameShape, Job, Result } from '$lib/capture/Frame';
import { CaptureLoop } from '$lib/capture/CaptureLoop';
import { toSourceFailure, type FrameSource, type SourceFailureError } from '$lib/capture/FrameSource';
import type { AnyEffectTransform } from '$lib/effects/EffectTransform';
import type { SeverityParameter } from '$lib/stores/severityStore';
import type { EffectIsolation } from '$lib/workers/EffectRunner';
import { DEFAULT_WORKER_CONFIG, WorkerLoop } from '$lib/workers/WorkerLoop';
import { BoundedFrameQueue, type OverflowPolicy } from './BoundedFrameQueue';
import { LatestResultSlot } from './LatestResultSlot';
import { PipelineDiagnostics, type DiagnosticListener } from './PipelineDiagnostics';
import {
	DEFAULT_PRESENTATION_CONFIG,
	PresentationLoop,
	assertDisplayFps,
	type PresentationSink
} from './PresentationLoop';
import type { CaptureOutcome, PipelineOutcome, StageState } from './types';

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
	/** Inbound queue capacity (1-10 typical) */
	inboundCapacity: number;
	/** Inbound overflow policy */
	inboundOverflow: OverflowPolicy;
	/** Number of concurrent workers */
	workerCount: number;
	/** Worker tryPop timeout in milliseconds */
	pollIntervalMs: number;
	/** Severities below this skip the effect */
	severityEpsilon: number;
	/** Display ticks per second */
	displayFps: number;
	/** Log the first transform failure and every Nth after it */
	failureLogInterval: number;
	/** Where loadable effects run (see WorkerLoopConfig.isolation) */
	isolation: EffectIsolation;
}

/**
 * Default configuration
 */
export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
	inboundCapacity: 2,
	inboundOverflow: 'drop-newest',
	workerCount: 1,
	pollIntervalMs: DEFAULT_WORKER_CONFIG.pollIntervalMs,
	severityEpsilon: DEFAULT_WORKER_CONFIG.severityEpsilon,
	displayFps: DEFAULT_PRESENTATION_CONFIG.displayFps,
	failureLogInterval: DEFAULT_WORKER_CONFIG.failureLogInterval,
	isolation: DEFAULT_WORKER_CONFIG.isolation
};

export const MAX_WORKERS = 16;

/**
 * Collaborators for one run
 */
export interface PipelineOptions {
	source: FrameSource;
	effect: AnyEffectTransform;
	sink: PresentationSink;
	severity: SeverityParameter;
	config?: Partial<PipelineConfig>;
}

/**
 * States of the individual loops
 */
export interface StageStates {
	capture: StageState;
	workers: StageState[];
	presentation: StageState;
}

/**
 * Validate a pipeline configuration
 *
 * @throws RangeError on the first invalid field
 */
export function validatePipelineConfig(config: PipelineConfig): void {
	if (!Number.isInteger(config.workerCount) || config.workerCount < 1 || config.workerCount > MAX_WORKERS) {
		throw new RangeError(`workerCount must be an integer in [1, ${MAX_WORKERS}], got ${config.workerCount}`);
	}
	if (!(config.pollIntervalMs > 0)) {
		throw new RangeError(`pollIntervalMs must be positive, got ${config.pollIntervalMs}`);
	}
	if (!(config.severityEpsilon >= 0 && config.severityEpsilon < 1)) {
		throw new RangeError(`severityEpsilon must be in [0, 1), got ${config.severityEpsilon}`);
	}
	if (!Number.isInteger(config.failureLogInterval) || config.failureLogInterval < 1) {
		throw new RangeError(`failureLogInterval must be a positive integer, got ${config.failureLogInterval}`);
	}
	assertDisplayFps(config.displayFps);
}

export class FramePipeline {
	private readonly source: FrameSource;
	private readonly effect: AnyEffectTransform;
	private readonly sink: PresentationSink;
	private readonly severity: SeverityParameter;
	private readonly config: PipelineConfig;
	private readonly controller = new AbortController();
	private readonly _diagnostics = new PipelineDiagnostics();

	private readonly inbound: BoundedFrameQueue<Job>;
	private readonly outbound = new LatestResultSlot<Result>();
	private readonly workers: WorkerLoop[];
	private readonly presentation: PresentationLoop;
	private capture: CaptureLoop | null = null;

	private _state: StageState = 'idle';
	private cancelReason: string | null = null;

	constructor(options: PipelineOptions) {
		this.config = { ...DEFAULT_PIPELINE_CONFIG, ...options.config };
		validatePipelineConfig(this.config);

		this.source = options.source;
		this.effect = options.effect;
		this.sink = options.sink;
		this.severity = options.severity;

		this.inbound = new BoundedFrameQueue<Job>({
			capacity: this.config.inboundCapacity,
			overflow: this.config.inboundOverflow
		});

		this.workers = [];
		for (let i = 0; i < this.config.workerCount; i++) {
			this.workers.push(
				new WorkerLoop(i, this.effect, this.inbound, this.outbound, this._diagnostics, {
					pollIntervalMs: this.config.pollIntervalMs,
					severityEpsilon: this.config.severityEpsilon,
					failureLogInterval: this.config.failureLogInterval,
					isolation: this.config.isolation
				})
			);
		}

		this.presentation = new PresentationLoop(this.outbound, this.sink, this._diagnostics, {
			displayFps: this.config.displayFps
		});
	}

	/** Overall lifecycle */
	get state(): StageState {
		return this._state;
	}

	/**
	 * Per-loop lifecycle
	 *
	 * Once the pipeline has stopped, loops that never started (the source
	 * failed to open) report 'stopped' as well.
	 */
	get stageStates(): StageStates {
		const settled = (state: StageState): StageState =>
			this._state === 'stopped' && state === 'idle' ? 'stopped' : state;
		return {
			capture: settled(this.capture?.state ?? 'idle'),
			workers: this.workers.map((w) => settled(w.state)),
			presentation: settled(this.presentation.state)
		};
	}

	get diagnostics(): PipelineDiagnostics {
		return this._diagnostics;
	}

	/** Effect this pipeline applies */
	get effectId(): string {
		return this.effect.id;
	}

	/** Ticks the presentation loop has run */
	get presentationTicks(): number {
		return this.presentation.ticks;
	}

	/** Tick of the most recent fresh frame */
	get lastFreshPresentTick(): number {
		return this.presentation.lastFreshPresentTick;
	}

	/** Inbound queue drop counter */
	get inboundDrops(): number {
		return this.inbound.dropCount;
	}

	/**
	 * Subscribe to diagnostic events (transform failures, stage stops)
	 *
	 * @returns unsubscribe function
	 */
	onDiagnostic(listener: DiagnosticListener): () => void {
		return this._diagnostics.subscribe(listener);
	}

	/**
	 * Request cooperative shutdown
	 *
	 * Returns immediately; await the promise from run() to know when every
	 * loop has stopped and the collaborators are released.
	 */
	cancel(reason = 'cancelled'): void {
		if (this.controller.signal.aborted) return;
		this.cancelReason = reason;
		if (this._state === 'running') {
			this._state = 'draining';
		}
		this.controller.abort();
	}

	/**
	 * Open the source, run every loop to completion, release collaborators
	 *
	 * Never rejects for conditions the pipeline absorbs (drops, transform
	 * failures, presentation timeouts). A source failure resolves with
	 * reason 'source-failure'.
	 */
	async run(): Promise<PipelineOutcome> {
		if (this._state !== 'idle') {
			throw new Error('FramePipeline can only run once');
		}
		this._state = 'running';
		const signal = this.controller.signal;

		let captureOutcome: CaptureOutcome = { reason: 'cancelled' };
		try {
			let shape: FrameShape;
			try {
				shape = await this.source.open();
			} catch (error: unknown) {
				const failure = toSourceFailure(this.source.name, error);
				console.error('[FramePipeline] Failed to open source:', failure.message);
				this._diagnostics.recordSourceFailure(failure.message);
				this.outbound.close();
				captureOutcome = { reason: 'source-failure', error: failure };
				return this.finish(captureOutcome);
			}

			console.log(
				`[FramePipeline] Running ${this.effect.id} on ${this.source.name} (${shape.width}x${shape.height}), ` +
					`${this.workers.length} ${this.workers[0].isolation} worker(s), ${this.config.displayFps}fps`
			);

			const capture = new CaptureLoop(this.source, shape, this.inbound, this.severity, this._diagnostics);
			this.capture = capture;

			const captureDone = capture.run(signal).then((outcome) => {
				captureOutcome = outcome;
				if (this._state === 'running') {
					this._state = 'draining';
				}
			});
			const workersDone = Promise.all(this.workers.map((w) => w.run(signal))).then(() => {
				this.outbound.close();
			});
			const presentationDone = this.presentation.run(signal);

			await Promise.all([captureDone, workersDone, presentationDone]);
			return this.finish(captureOutcome);
		} finally {
			await this.release();
			this._state = 'stopped';
		}
	}

	private finish(captureOutcome: CaptureOutcome): PipelineOutcome {
		const cancelled = this.cancelReason !== null;
		const error: SourceFailureError | null =
			!cancelled && captureOutcome.reason === 'source-failure' ? captureOutcome.error : null;

		const outcome: PipelineOutcome = {
			reason: cancelled ? 'cancelled' : captureOutcome.reason,
			error,
			lastCapturedSequence: this.capture?.lastSequence ?? 0,
			lastPresentedSequence: this.presentation.lastShownSequence,
			diagnostics: this._diagnostics.snapshot()
		};

		console.log(
			`[FramePipeline] Stopped (${outcome.reason}${this.cancelReason && this.cancelReason !== 'cancelled' ? `: ${this.cancelReason}` : ''}) ` +
				`captured=${outcome.diagnostics.capturedFrames} presented=${outcome.diagnostics.presentedFrames} ` +
				`dropped=${outcome.diagnostics.droppedJobs} failures=${outcome.diagnostics.transformFailures}`
		);
		return outcome;
	}

	private async release(): Promise<void> {
		try {
			await this.source.close();
		} catch (error: unknown) {
			const message = error instanceof Error ? error.message : String(error);
			console.warn('[FramePipeline] Source close failed:', message);
		}

		try {
			await this.sink.close?.();
		} catch (error: unknown) {
			const message = error instanceof Error ? error.message : String(error);
			console.warn('[FramePipeline] Sink close failed:', message);
		}
	}
}
