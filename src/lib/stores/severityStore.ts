/**
 * Severity store
 *
 * The one value shared between the input collaborator (slider, keyboard)
 * and the workers. Writers call set(); the capture loop samples get()
 * once per frame. Effects are continuous in severity, so a read that
 * lags a write by a frame is fine. A JS number is read and written
 * whole on the event loop, so no read ever observes half an update.
 */

export const MIN_SEVERITY = 0;
export const MAX_SEVERITY = 1;

/**
 * Listener notified after every accepted change
 */
export type SeverityListener = (value: number, previous: number) => void;

/**
 * Clamp a severity into [0, 1]
 *
 * @throws RangeError for NaN or infinite input
 */
export function normalizeSeverity(value: number): number {
	if (!Number.isFinite(value)) {
		throw new RangeError(`Severity must be a finite number, got ${value}`);
	}
	return Math.min(MAX_SEVERITY, Math.max(MIN_SEVERITY, value));
}

/**
 * Single read/write severity cell
 *
 * @example
 * ```typescript
 * const severity = new SeverityParameter(0.25);
 * const unsubscribe = severity.subscribe((v) => slider.draw(v));
 *
 * severity.set(0.5);
 * severity.get(); // 0.5
 * ```
 */
export class SeverityParameter {
	private value: number;
	private readonly listeners = new Set<SeverityListener>();

	constructor(initial = 0) {
		this.value = normalizeSeverity(initial);
	}

	/** Latest value */
	get(): number {
		return this.value;
	}

	/**
	 * Replace the value (clamped into [0, 1])
	 *
	 * @returns the value actually stored
	 */
	set(value: number): number {
		const next = normalizeSeverity(value);
		const previous = this.value;
		if (next === previous) {
			return next;
		}

		this.value = next;
		for (const listener of this.listeners) {
			try {
				listener(next, previous);
			} catch (error: unknown) {
				const message = error instanceof Error ? error.message : String(error);
				console.error('[SeverityParameter] Listener error:', message);
			}
		}
		return next;
	}

	/**
	 * Move the value by `delta`, clamped
	 */
	adjust(delta: number): number {
		return this.set(this.value + delta);
	}

	/**
	 * Register a change listener
	 *
	 * @returns unsubscribe function
	 */
	subscribe(listener: SeverityListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}
}
