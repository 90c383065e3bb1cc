/**
 * PipelineDiagnostics - Counters and rolling timings for one pipeline run
 *
 * Everything the pipeline absorbs instead of raising (drops, stale
 * results, transform failures, presentation timeouts) ends up here.
 * A wrapping application polls snapshot() or subscribes to events.
 */

/** Number of samples kept in each rolling window */
const HISTORY_SIZE = 60;

/**
 * Diagnostic event pushed to listeners as it happens
 */
export type DiagnosticEvent =
	| { type: 'transform-failure'; sequence: number; workerId: number; error: string }
	| { type: 'source-failure'; error: string }
	| { type: 'stage-stopped'; stage: 'capture' | 'worker' | 'presentation'; id: number };

export type DiagnosticListener = (event: DiagnosticEvent) => void;

/**
 * Point-in-time view of the counters
 */
export interface DiagnosticsSnapshot {
	capturedFrames: number;
	droppedJobs: number;
	processedJobs: number;
	passthroughJobs: number;
	transformFailures: number;
	staleResults: number;
	replacedResults: number;
	presentedFrames: number;
	repeatedFrames: number;
	presentationTimeouts: number;
	/** Mean per-Job worker latency over the rolling window (ms) */
	averageWorkerLatencyMs: number;
	/** Fresh frames per second over the rolling window */
	presentedFps: number;
	/** droppedJobs / capturedFrames (0 when nothing captured) */
	dropRate: number;
	/** presentationTimeouts / ticks (0 before the first tick) */
	timeoutRate: number;
}

export class PipelineDiagnostics {
	private capturedFrames = 0;
	private droppedJobs = 0;
	private processedJobs = 0;
	private passthroughJobs = 0;
	private transformFailures = 0;
	private staleResults = 0;
	private replacedResults = 0;
	private presentedFrames = 0;
	private repeatedFrames = 0;
	private presentationTimeouts = 0;
	private ticks = 0;

	private workerLatencies: number[] = [];
	private presentTimes: number[] = [];
	private readonly listeners = new Set<DiagnosticListener>();

	/**
	 * Records one captured frame and whether the inbound queue admitted it
	 */
	recordCapture(admitted: boolean): void {
		this.capturedFrames++;
		if (!admitted) {
			this.droppedJobs++;
		}
	}

	/**
	 * Records one finished Job
	 * @param latencyMs - pop-to-publish time
	 */
	recordJob(outcome: 'applied' | 'passthrough' | 'failed', latencyMs: number): void {
		this.processedJobs++;
		if (outcome === 'passthrough') {
			this.passthroughJobs++;
		}

		this.workerLatencies.push(latencyMs);
		if (this.workerLatencies.length > HISTORY_SIZE) {
			this.workerLatencies.shift();
		}
	}

	/**
	 * Records a caught transform failure and notifies listeners
	 */
	recordTransformFailure(sequence: number, workerId: number, error: string): void {
		this.transformFailures++;
		this.emit({ type: 'transform-failure', sequence, workerId, error });
	}

	/**
	 * Records a result the outbound slot refused or overwrote
	 */
	recordSlotOutcome(published: boolean, replaced: boolean): void {
		if (!published) {
			this.staleResults++;
		}
		if (replaced) {
			this.replacedResults++;
		}
	}

	/**
	 * Records one presentation tick
	 * @param kind - fresh: new result shown; repeat: last frame re-shown after timeout;
	 *               idle: timeout with nothing to show yet
	 */
	recordTick(kind: 'fresh' | 'repeat' | 'idle', timestamp: number): void {
		this.ticks++;
		if (kind === 'fresh') {
			this.presentedFrames++;
			this.presentTimes.push(timestamp);
			if (this.presentTimes.length > HISTORY_SIZE) {
				this.presentTimes.shift();
			}
			return;
		}

		this.presentationTimeouts++;
		if (kind === 'repeat') {
			this.repeatedFrames++;
		}
	}

	/**
	 * Forwards a terminal source failure to listeners
	 */
	recordSourceFailure(error: string): void {
		this.emit({ type: 'source-failure', error });
	}

	recordStageStopped(stage: 'capture' | 'worker' | 'presentation', id: number): void {
		this.emit({ type: 'stage-stopped', stage, id });
	}

	/**
	 * Subscribe to diagnostic events
	 *
	 * @returns unsubscribe function
	 */
	subscribe(listener: DiagnosticListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	getAverageWorkerLatency(): number {
		if (this.workerLatencies.length === 0) return 0;

		const sum = this.workerLatencies.reduce((a, b) => a + b, 0);
		return sum / this.workerLatencies.length;
	}

	getPresentedFps(): number {
		if (this.presentTimes.length < 2) return 0;

		const first = this.presentTimes[0];
		const last = this.presentTimes[this.presentTimes.length - 1];
		const span = last - first;
		return span > 0 ? ((this.presentTimes.length - 1) * 1000) / span : 0;
	}

	snapshot(): DiagnosticsSnapshot {
		return {
			capturedFrames: this.capturedFrames,
			droppedJobs: this.droppedJobs,
			processedJobs: this.processedJobs,
			passthroughJobs: this.passthroughJobs,
			transformFailures: this.transformFailures,
			staleResults: this.staleResults,
			replacedResults: this.replacedResults,
			presentedFrames: this.presentedFrames,
			repeatedFrames: this.repeatedFrames,
			presentationTimeouts: this.presentationTimeouts,
			averageWorkerLatencyMs: this.getAverageWorkerLatency(),
			presentedFps: this.getPresentedFps(),
			dropRate: this.capturedFrames > 0 ? this.droppedJobs / this.capturedFrames : 0,
			timeoutRate: this.ticks > 0 ? this.presentationTimeouts / this.ticks : 0
		};
	}

	private emit(event: DiagnosticEvent): void {
		for (const listener of this.listeners) {
			try {
				listener(event);
			} catch (error: unknown) {
				const message = error instanceof Error ? error.message : String(error);
				console.error('[PipelineDiagnostics] Listener error:', message);
			}
		}
	}
}
