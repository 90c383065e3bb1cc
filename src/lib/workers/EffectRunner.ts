/**
 * EffectRunner - Where a worker's effect actually executes
 *
 * A WorkerLoop hands every non-passthrough Job to its runner. Effects that
 * declare a `module` run on their own thread (EffectThread), so a
 * synchronous pixel loop never blocks the display tick. Effects without
 * one, and every effect under `isolation: 'inline'`, run on the event
 * loop (InlineEffectRunner).
 *
 * Either way the runner owns the effect's init() state for one worker.
 *
 * @module workers/EffectRunner
 */

import type { Frame } from '$lib/capture/Frame';
import type { AnyEffectTransform } from '$lib/effects/EffectTransform';
import { now } from '$lib/utils/timing';
import { EffectThread } from './EffectThread';

export type EffectIsolation = 'thread' | 'inline';

export interface EffectRunner {
	readonly mode: EffectIsolation;

	/**
	 * Run the effect over `frame`
	 *
	 * Rejects when the effect throws or the thread running it dies.
	 */
	apply(frame: Frame, severity: number): Promise<Frame>;

	/** Drop the effect state and stop any thread */
	close(): Promise<void>;
}

export class InlineEffectRunner implements EffectRunner {
	readonly mode = 'inline' as const;
	private readonly workerId: number;
	private readonly effect: AnyEffectTransform;
	private state: { value: unknown } | null = null;

	constructor(workerId: number, effect: AnyEffectTransform) {
		this.workerId = workerId;
		this.effect = effect;
	}

	async apply(frame: Frame, severity: number): Promise<Frame> {
		return this.effect.apply(frame, severity, this.ensureState(frame));
	}

	async close(): Promise<void> {
		this.state = null;
	}

	private ensureState(frame: Frame): unknown {
		if (this.state === null) {
			const startTime = now();
			const value = this.effect.init({
				width: frame.width,
				height: frame.height,
				channels: frame.channels
			});
			this.state = { value };
			console.log(
				`[WorkerLoop ${this.workerId}] ${this.effect.id} initialized for ${frame.width}x${frame.height} in ${(now() - startTime).toFixed(2)}ms`
			);
		}
		return this.state.value;
	}
}

/**
 * Runner for `effect`: a thread when the effect can be loaded by id there
 */
export function createEffectRunner(workerId: number, effect: AnyEffectTransform, isolation: EffectIsolation): EffectRunner {
	if (isolation === 'thread' && effect.module !== undefined) {
		return new EffectThread(workerId, effect, effect.module);
	}
	return new InlineEffectRunner(workerId, effect);
}
