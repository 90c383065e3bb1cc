/**
 * File-backed frame sources
 *
 * Raw dumps (.rgb, .rgba, .raw) are read directly and paced at the
 * configured frame rate. Anything else is treated as a container
 * format and decoded by ffmpeg.
 *
 * @module capture/FileFrameSource
 */

import { createReadStream } from 'node:fs';
import { extname } from 'node:path';
import { DEFAULT_SOURCE_CONFIG, SourceFailureError, type FrameSource, type FrameSourceConfig } from './FrameSource';
import { FfmpegFrameSource, type FfmpegSourceOptions } from './FfmpegFrameSource';
import { PacedFrameSource } from './PacedFrameSource';
import { StreamFrameSource } from './StreamFrameSource';

/** Extensions read as headerless interleaved pixel data */
export const RAW_EXTENSIONS: readonly string[] = ['.rgb', '.rgba', '.raw'];

/**
 * Whether a path names a raw pixel dump
 */
export function isRawVideoPath(path: string): boolean {
	return RAW_EXTENSIONS.includes(extname(path).toLowerCase());
}

/**
 * Create a source for `config.path`
 *
 * The file is not touched until open(); a missing file surfaces as a
 * SourceFailureError from open() or the first read().
 *
 * @throws SourceFailureError if no path is configured
 */
export function createFileFrameSource(
	config: Partial<FrameSourceConfig>,
	ffmpegOptions: Partial<FfmpegSourceOptions> = {}
): FrameSource {
	const merged: FrameSourceConfig = { ...DEFAULT_SOURCE_CONFIG, ...config };
	const path = merged.path;
	if (path === null || path.length === 0) {
		throw new SourceFailureError('file', 'no file path configured');
	}

	if (!isRawVideoPath(path)) {
		return new FfmpegFrameSource({ kind: 'file', path }, merged, ffmpegOptions);
	}

	// .rgba implies four channels regardless of the configured count
	const channels = extname(path).toLowerCase() === '.rgba' ? 4 : merged.channels;
	const stream = new StreamFrameSource(`file:${path}`, () => createReadStream(path), {
		width: merged.width,
		height: merged.height,
		channels
	});

	return merged.frameRate > 0 ? new PacedFrameSource(stream, merged.frameRate) : stream;
}
