/**
 * PresentationLoop - Fixed-rate display loop for processed frames
 *
 * Ticks fire once per period. Each takes whatever the outbound slot holds
 * at that moment: a fresh result is presented and remembered, otherwise
 * the last presented frame is shown again, so the display keeps its rate
 * however slow the effect is. A fresh result waits at most one period.
 *
 * Presentation is latest-wins: frames may be skipped, but a result older
 * than the one last shown is discarded, never rendered.
 *
 * Tick timing accounts for drift the same way an rAF loop does: the next
 * deadline advances by one interval from the previous deadline, and is
 * reset to now if the loop fell behind.
 *
 * @module core/PresentationLoop
 */

import type { Frame, Result } from '$lib/capture/Frame';
import type { LatestResultSlot } from './LatestResultSlot';
import type { PipelineDiagnostics } from './PipelineDiagnostics';
import type { StageState } from './types';
import { delay, now } from '$lib/utils/timing';

/**
 * Per-call details handed to the sink
 */
export interface PresentInfo {
	/** Sequence number of the frame being shown */
	sequence: number;
	/** Severity the frame was processed at */
	severity: number;
	/** True when re-showing the last frame after a timeout */
	repeated: boolean;
	/** Tick counter, starting at 1 */
	tick: number;
}

/**
 * Display collaborator
 */
export interface PresentationSink {
	/** Render one frame. Expected to return quickly. */
	present(frame: Frame, info: PresentInfo): void | Promise<void>;
	/** Release the display surface */
	close?(): void | Promise<void>;
}

/**
 * Configuration for the presentation loop
 */
export interface PresentationConfig {
	/** Display ticks per second (1-120) */
	displayFps: number;
}

/**
 * Default configuration
 */
export const DEFAULT_PRESENTATION_CONFIG: PresentationConfig = {
	displayFps: 30
};

export const MIN_DISPLAY_FPS = 1;
export const MAX_DISPLAY_FPS = 120;

/**
 * Validate a display rate
 *
 * @throws RangeError outside [MIN_DISPLAY_FPS, MAX_DISPLAY_FPS]
 */
export function assertDisplayFps(fps: number): void {
	if (!Number.isFinite(fps) || fps < MIN_DISPLAY_FPS || fps > MAX_DISPLAY_FPS) {
		throw new RangeError(
			`displayFps must be between ${MIN_DISPLAY_FPS} and ${MAX_DISPLAY_FPS}, got ${fps}`
		);
	}
}

export class PresentationLoop {
	private readonly slot: LatestResultSlot<Result>;
	private readonly sink: PresentationSink;
	private readonly diagnostics: PipelineDiagnostics;
	private readonly frameInterval: number;
	private _state: StageState = 'idle';
	private lastShown: Result | null = null;
	private tickCount = 0;
	private lastFreshTick = 0;
	private sinkErrors = 0;

	constructor(
		slot: LatestResultSlot<Result>,
		sink: PresentationSink,
		diagnostics: PipelineDiagnostics,
		config: Partial<PresentationConfig> = {}
	) {
		const merged = { ...DEFAULT_PRESENTATION_CONFIG, ...config };
		assertDisplayFps(merged.displayFps);

		this.slot = slot;
		this.sink = sink;
		this.diagnostics = diagnostics;
		this.frameInterval = 1000 / merged.displayFps;
	}

	get state(): StageState {
		return this._state;
	}

	/** Tick period in milliseconds */
	get interval(): number {
		return this.frameInterval;
	}

	/** Ticks run so far */
	get ticks(): number {
		return this.tickCount;
	}

	/** Tick on which the most recent fresh frame was presented (0 if none) */
	get lastFreshPresentTick(): number {
		return this.lastFreshTick;
	}

	/** Sequence number of the last presented frame (0 if none) */
	get lastShownSequence(): number {
		return this.lastShown?.sequence ?? 0;
	}

	/**
	 * Run until the slot is closed and empty, or `signal` aborts
	 */
	async run(signal: AbortSignal): Promise<void> {
		if (this._state !== 'idle') {
			throw new Error('PresentationLoop can only run once');
		}
		this._state = 'running';

		try {
			let deadline = now();
			while (!signal.aborted) {
				const keepGoing = await this.tick(signal, 0);
				if (!keepGoing) {
					break;
				}

				deadline += this.frameInterval;
				const wait = deadline - now();
				if (wait > 0) {
					await delay(wait, signal);
				} else {
					deadline = now();
				}
			}
		} finally {
			this._state = 'draining';
			// Anything left unclaimed after cancellation is discarded
			this.slot.discard();
			this._state = 'stopped';
			this.diagnostics.recordStageStopped('presentation', 0);
		}
	}

	/**
	 * Run one display tick, waiting up to `timeoutMs` for a result
	 *
	 * run() paces itself and polls with a timeout of 0.
	 *
	 * @returns false once the slot is closed and empty (nothing more will arrive)
	 */
	async tick(signal?: AbortSignal, timeoutMs = this.frameInterval): Promise<boolean> {
		const result = await this.slot.take(timeoutMs, signal);
		if (signal?.aborted) {
			return false;
		}

		if (result === null && this.slot.isClosed && !this.slot.hasPending) {
			return false;
		}

		this.tickCount++;

		if (result !== null) {
			if (this.lastShown !== null && result.sequence <= this.lastShown.sequence) {
				this.diagnostics.recordSlotOutcome(false, false);
				return true;
			}
			this.lastShown = result;
			this.lastFreshTick = this.tickCount;
			await this.show(result, false);
			this.diagnostics.recordTick('fresh', now());
			return true;
		}

		if (this.lastShown !== null) {
			await this.show(this.lastShown, true);
			this.diagnostics.recordTick('repeat', now());
		} else {
			this.diagnostics.recordTick('idle', now());
		}
		return true;
	}

	private async show(result: Result, repeated: boolean): Promise<void> {
		try {
			await this.sink.present(result.frame, {
				sequence: result.sequence,
				severity: result.severity,
				repeated,
				tick: this.tickCount
			});
		} catch (error: unknown) {
			this.sinkErrors++;
			if (this.sinkErrors === 1) {
				const message = error instanceof Error ? error.message : String(error);
				console.error('[PresentationLoop] Sink failed to present frame:', message);
			}
		}
	}
}
