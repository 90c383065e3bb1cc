/**
 * Core Modules
 *
 * The frame pipeline and its building blocks:
 * - BoundedFrameQueue: inbound queue, drop-newest on overflow
 * - LatestResultSlot: outbound single slot, highest sequence wins
 * - PresentationLoop: fixed-rate display loop
 * - PipelineDiagnostics: counters and rolling timings
 * - FramePipeline: wires capture, workers and presentation together
 */

export { BoundedFrameQueue, DEFAULT_QUEUE_CONFIG } from './BoundedFrameQueue';
export type { BoundedQueueConfig, OverflowPolicy } from './BoundedFrameQueue';

export { LatestResultSlot } from './LatestResultSlot';

export {
	PresentationLoop,
	DEFAULT_PRESENTATION_CONFIG,
	MIN_DISPLAY_FPS,
	MAX_DISPLAY_FPS,
	assertDisplayFps
} from './PresentationLoop';
export type { PresentInfo, PresentationSink, PresentationConfig } from './PresentationLoop';

export { PipelineDiagnostics } from './PipelineDiagnostics';
export type { DiagnosticEvent, DiagnosticListener, DiagnosticsSnapshot } from './PipelineDiagnostics';

export { FramePipeline, DEFAULT_PIPELINE_CONFIG, MAX_WORKERS, validatePipelineConfig } from './FramePipeline';
export type { PipelineConfig, PipelineOptions, StageStates } from './FramePipeline';

export type { CaptureOutcome, PipelineOutcome, StageState, StopReason } from './types';
