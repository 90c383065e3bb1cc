/**
 * Message types for the effect worker thread
 *
 * Defines the protocol between a WorkerLoop (main thread) and the thread
 * that runs its effect. Pixel buffers are transferred, not copied, in
 * both directions.
 */

import type { FrameShape } from '../capture/Frame';

/**
 * Message types for thread communication
 */
export enum MessageType {
	/** Run the effect over one frame */
	Apply = 'apply',
	/** Effect output is ready */
	Applied = 'applied',
	/** Effect threw or rejected; the thread keeps running */
	Failed = 'failed'
}

/**
 * One frame to process
 */
export interface ApplyRequest {
	type: MessageType.Apply;
	/** Correlates the response */
	id: number;
	/** Module exporting the effect (see EffectTransform.module) */
	module: string;
	effectId: string;
	shape: FrameShape;
	severity: number;
	sequence: number;
	timestamp: number;
	/** Owned copy of the frame's pixels; transferred to the thread */
	pixels: Uint8ClampedArray;
}

export interface AppliedResponse {
	type: MessageType.Applied;
	id: number;
	pixels: Uint8ClampedArray;
	/** Milliseconds spent in init() when this request built new state, else null */
	initMs: number | null;
}

export interface FailedResponse {
	type: MessageType.Failed;
	id: number;
	error: string;
	stack?: string;
}

export type EffectThreadResponse = AppliedResponse | FailedResponse;
