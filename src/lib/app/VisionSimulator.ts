/**
 * VisionSimulator - Session controller over FramePipeline
 *
 * Owns the severity value and at most one running pipeline. Starting an
 * effect while another runs stops the old session first, so only one
 * transform is ever active. Starts and stops are serialised: a second
 * call waits for the first to finish.
 *
 * @example
 * ```typescript
 * const simulator = new VisionSimulator({
 *   registry: createDefaultRegistry(),
 *   createSource: () => new SyntheticFrameSource(),
 *   sink: new TerminalSurface(process.stdout)
 * });
 *
 * await simulator.start('cataract');
 * simulator.setSeverity(0.8);
 * await simulator.stop();
 * ```
 *
 * @module app/VisionSimulator
 */

import type { FrameSource } from '$lib/capture/FrameSource';
import { FramePipeline, type PipelineConfig, type PipelineOutcome, type PresentationSink } from '$lib/core';
import type { EffectRegistry } from '$lib/effects/EffectRegistry';
import type { AnyEffectTransform } from '$lib/effects/EffectTransform';
import { SeverityParameter } from '$lib/stores/severityStore';

export type SimulatorEvent =
	| { type: 'started'; effect: AnyEffectTransform }
	| { type: 'stopped'; effectId: string; outcome: PipelineOutcome }
	| { type: 'failed'; effectId: string; error: Error };

export type SimulatorListener = (event: SimulatorEvent) => void;

export interface SimulatorOptions {
	registry: EffectRegistry;
	/** Called once per session; each pipeline gets a fresh source */
	createSource: () => FrameSource;
	sink: PresentationSink;
	severity?: SeverityParameter;
	pipeline?: Partial<PipelineConfig>;
}

interface Session {
	pipeline: FramePipeline;
	done: Promise<PipelineOutcome | null>;
}

export class VisionSimulator {
	readonly severity: SeverityParameter;
	private readonly options: SimulatorOptions;
	private readonly listeners = new Set<SimulatorListener>();
	private session: Session | null = null;
	private transition: Promise<unknown> = Promise.resolve();
	private _lastOutcome: PipelineOutcome | null = null;
	private _lastError: Error | null = null;

	constructor(options: SimulatorOptions) {
		this.options = options;
		this.severity = options.severity ?? new SeverityParameter();
	}

	/** Id of the running effect, null between sessions */
	get activeEffectId(): string | null {
		return this.session?.pipeline.effectId ?? null;
	}

	get isRunning(): boolean {
		return this.session !== null;
	}

	/** Outcome of the most recently finished session */
	get lastOutcome(): PipelineOutcome | null {
		return this._lastOutcome;
	}

	/** Unexpected error that ended the last session, if any */
	get lastError(): Error | null {
		return this._lastError;
	}

	/** Running pipeline, for diagnostics */
	get pipeline(): FramePipeline | null {
		return this.session?.pipeline ?? null;
	}

	subscribe(listener: SimulatorListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * @returns the value actually stored (clamped into [0, 1])
	 */
	setSeverity(value: number): number {
		return this.severity.set(value);
	}

	/**
	 * Start `effectId`, stopping the current session first
	 *
	 * Resolves once the new pipeline is running. Rejects for an unknown
	 * effect id and leaves the current session running.
	 */
	start(effectId: string): Promise<void> {
		let effect: AnyEffectTransform;
		try {
			effect = this.options.registry.require(effectId);
		} catch (error: unknown) {
			return Promise.reject(error);
		}
		return this.serialise(async () => {
			await this.stopSession('switching effect');

			const pipeline = new FramePipeline({
				source: this.options.createSource(),
				effect,
				sink: this.options.sink,
				severity: this.severity,
				config: this.options.pipeline
			});

			const done = pipeline.run().then(
				(outcome) => this.finishSession(pipeline, outcome),
				(error: unknown) => {
					const failure = error instanceof Error ? error : new Error(String(error));
					this._lastError = failure;
					console.error('[VisionSimulator] Pipeline failed:', failure.message);
					if (this.session?.pipeline === pipeline) {
						this.session = null;
					}
					this.emit({ type: 'failed', effectId: pipeline.effectId, error: failure });
					return null;
				}
			);

			this.session = { pipeline, done };
			this._lastError = null;
			this.emit({ type: 'started', effect });
		});
	}

	/**
	 * Switch to the effect `offset` places away in the registry
	 */
	cycleEffect(offset: number): Promise<void> {
		const current = this.activeEffectId ?? this.options.registry.ids()[0];
		return this.start(this.options.registry.cycle(current, offset));
	}

	/**
	 * Stop the current session
	 *
	 * @returns its outcome, or null if nothing was running
	 */
	stop(): Promise<PipelineOutcome | null> {
		return this.serialise(() => this.stopSession('stopped'));
	}

	/**
	 * Wait for the current session to end by itself (source exhausted or failed)
	 */
	async whenStopped(): Promise<PipelineOutcome | null> {
		const session = this.session;
		return session ? session.done : this._lastOutcome;
	}

	private async stopSession(reason: string): Promise<PipelineOutcome | null> {
		const session = this.session;
		if (!session) {
			return null;
		}
		session.pipeline.cancel(reason);
		return session.done;
	}

	private finishSession(pipeline: FramePipeline, outcome: PipelineOutcome): PipelineOutcome {
		if (this.session?.pipeline === pipeline) {
			this.session = null;
		}
		this._lastOutcome = outcome;
		this.emit({ type: 'stopped', effectId: pipeline.effectId, outcome });
		return outcome;
	}

	private serialise<T>(task: () => Promise<T>): Promise<T> {
		const next = this.transition.then(task);
		// Keep the chain alive after a failed step; the caller still sees the rejection
		this.transition = next.catch((error: unknown) => {
			const message = error instanceof Error ? error.message : String(error);
			console.warn('[VisionSimulator] Transition failed:', message);
		});
		return next;
	}

	private emit(event: SimulatorEvent): void {
		for (const listener of this.listeners) {
			try {
				listener(event);
			} catch (error: unknown) {
				const message = error instanceof Error ? error.message : String(error);
				console.error('[VisionSimulator] Listener error:', message);
			}
		}
	}
}
