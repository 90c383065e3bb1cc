/**
 * Shared pipeline types
 */

import type { SourceFailureError } from '$lib/capture/FrameSource';
import type { DiagnosticsSnapshot } from './PipelineDiagnostics';

/**
 * Lifecycle of a single stage (capture, a worker, presentation) and of
 * the pipeline as a whole
 * - idle: constructed, not started
 * - running: processing frames
 * - draining: no new input accepted, finishing what is pending
 * - stopped: terminal
 */
export type StageState = 'idle' | 'running' | 'draining' | 'stopped';

/**
 * Why a pipeline run ended
 */
export type StopReason = 'source-exhausted' | 'source-failure' | 'cancelled';

/**
 * How the capture loop ended
 */
export type CaptureOutcome =
	| { reason: 'source-exhausted' }
	| { reason: 'source-failure'; error: SourceFailureError }
	| { reason: 'cancelled' };

/**
 * Value resolved by FramePipeline.run()
 */
export interface PipelineOutcome {
	reason: StopReason;
	/** Set only for source-failure */
	error: SourceFailureError | null;
	/** Sequence number of the last captured frame */
	lastCapturedSequence: number;
	/** Sequence number of the last presented frame (0 if none) */
	lastPresentedSequence: number;
	diagnostics: DiagnosticsSnapshot;
}
