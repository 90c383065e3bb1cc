/**
 * Capture Module - Frame model, sources and the capture loop
 *
 * Components:
 * - Frame: pixel data model shared by every stage
 * - FrameSource: source contract and SourceFailureError
 * - SyntheticFrameSource: generated test pattern
 * - StreamFrameSource: fixed-size frames from any Readable
 * - FfmpegFrameSource: camera or video file through an ffmpeg child process
 * - createFileFrameSource: raw dump or container file
 * - CaptureLoop: source → inbound queue
 *
 * @module capture
 */

export {
	assertFrameShape,
	createFrame,
	frameByteLength,
	sameShape,
	withPixels,
	type Frame,
	type FrameShape,
	type Job,
	type RawFrame,
	type Result,
	type ResultOutcome
} from './Frame';

export {
	DEFAULT_SOURCE_CONFIG,
	SourceFailureError,
	toSourceFailure,
	type FrameSource,
	type FrameSourceConfig
} from './FrameSource';

export {
	SyntheticFrameSource,
	renderTestPattern,
	type SyntheticSourceConfig,
	DEFAULT_SYNTHETIC_CONFIG
} from './SyntheticFrameSource';

export { StreamFrameSource, type StreamSourceConfig, DEFAULT_STREAM_CONFIG } from './StreamFrameSource';

export { PacedFrameSource } from './PacedFrameSource';

export {
	FfmpegFrameSource,
	buildFfmpegArgs,
	type CaptureProcess,
	type FfmpegInput,
	type FfmpegSourceOptions,
	type ProcessSpawner,
	DEFAULT_FFMPEG_OPTIONS
} from './FfmpegFrameSource';

export { createFileFrameSource, isRawVideoPath, RAW_EXTENSIONS } from './FileFrameSource';

export { CaptureLoop } from './CaptureLoop';
