/**
 * EffectTransform - Contract for one simulated visual impairment
 *
 * An effect is a pure function of (frame, severity, state). `state` is
 * built once per session by init() from the frame shape alone: masks,
 * distortion fields and other severity-independent lookup tables. It is
 * never mutated by apply(), and the same shape (and seed) always yields
 * bit-identical state.
 *
 * Each worker calls init() for itself and owns the resulting state, so
 * any scratch space an effect keeps in its state is never shared between
 * two concurrent apply() calls.
 */

import type { Frame, FrameShape } from '../capture/Frame';

/**
 * Grouping used by the effect picker
 */
export type EffectCategory = 'blur' | 'field-loss' | 'color' | 'distortion';

/**
 * A pluggable disease simulation
 */
export interface EffectTransform<State = unknown> {
	/** Unique identifier, used as the registry key and on the command line */
	readonly id: string;

	/** Human-readable label for the status line */
	readonly label: string;

	readonly category: EffectCategory;

	/**
	 * URL of a module exporting this effect under the same id
	 *
	 * Effects that have one can be loaded by id on a worker thread; the
	 * rest always run on the calling thread. See `loadableFrom`.
	 */
	readonly module?: string;

	/**
	 * Build severity-independent lookup tables for frames of `shape`
	 */
	init(shape: FrameShape): State;

	/**
	 * Produce the impaired frame
	 *
	 * Must return a new frame (see `withPixels`) and leave `frame` and
	 * `state` untouched. May be async.
	 *
	 * @param severity - in [0, 1]; the pipeline skips the call entirely
	 *                   when severity is below its epsilon
	 */
	apply(frame: Frame, severity: number, state: State): Frame | Promise<Frame>;
}

/**
 * Any effect, regardless of its state type
 *
 * The pipeline only ever feeds an effect the state that effect's own
 * init() returned. Method parameters are checked bivariantly, so every
 * `EffectTransform<S>` is assignable here.
 */
export type AnyEffectTransform = EffectTransform<unknown>;

/**
 * Mark `effect` as exported by the module at `moduleUrl`
 *
 * @example
 * ```typescript
 * export const glaucomaEffect = loadableFrom({ id: 'glaucoma', ... }, import.meta.url);
 * ```
 */
export function loadableFrom<State>(effect: EffectTransform<State>, moduleUrl: string): EffectTransform<State> {
	return { ...effect, module: moduleUrl };
}

/**
 * Narrow a module export to an effect
 */
export function isEffectTransform(value: unknown): value is AnyEffectTransform {
	if (typeof value !== 'object' || value === null) {
		return false;
	}
	return (
		'id' in value &&
		typeof value.id === 'string' &&
		'label' in value &&
		typeof value.label === 'string' &&
		'init' in value &&
		typeof value.init === 'function' &&
		'apply' in value &&
		typeof value.apply === 'function'
	);
}
