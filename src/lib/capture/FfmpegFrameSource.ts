/**
 * FfmpegFrameSource - Camera or video file frames decoded by an ffmpeg child process
 *
 * ffmpeg does the device access, decoding and scaling, and writes raw
 * rgb24/rgba frames to stdout, which StreamFrameSource cuts into frames.
 * ffmpeg itself is an external binary found on PATH; it is not bundled.
 *
 * Devices are selected by explicit index. There is no auto-detection:
 * a missing device makes ffmpeg exit early, which surfaces as a
 * SourceFailureError carrying ffmpeg's last stderr lines.
 *
 * close() resolves only after the process has exited, so the device is
 * free for the next session. ffmpeg gets SIGTERM, then SIGKILL if it is
 * still running after `killGraceMs`.
 *
 * @module capture/FfmpegFrameSource
 */

import { spawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import type { Readable } from 'node:stream';
import { settlesWithin } from '$lib/utils/timing';
import { assertFrameShape, type FrameShape, type RawFrame } from './Frame';
import { DEFAULT_SOURCE_CONFIG, SourceFailureError, type FrameSource, type FrameSourceConfig } from './FrameSource';
import { StreamFrameSource } from './StreamFrameSource';

/**
 * Where ffmpeg reads from
 */
export type FfmpegInput = { kind: 'camera'; device: number } | { kind: 'file'; path: string };

/**
 * The parts of a child process this source relies on
 */
export interface CaptureProcess extends EventEmitter {
	readonly stdout: Readable | null;
	readonly stderr: Readable | null;
	readonly exitCode: number | null;
	readonly signalCode: NodeJS.Signals | null;
	kill(signal?: NodeJS.Signals): boolean;
}

export type ProcessSpawner = (command: string, args: string[]) => CaptureProcess;

/**
 * Options beyond the frame source config
 */
export interface FfmpegSourceOptions {
	/** ffmpeg executable */
	command: string;
	/** Platform used to pick the capture input format */
	platform: NodeJS.Platform;
	/** Process factory (replaced in tests) */
	spawner: ProcessSpawner;
	/** How long close() waits after each signal before escalating */
	killGraceMs: number;
}

const defaultSpawner: ProcessSpawner = (command, args) =>
	spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

export const DEFAULT_FFMPEG_OPTIONS: FfmpegSourceOptions = {
	command: 'ffmpeg',
	platform: process.platform,
	spawner: defaultSpawner,
	killGraceMs: 2000
};

/** Lines of ffmpeg stderr kept for error messages */
const STDERR_TAIL_LINES = 5;

function hasExited(child: CaptureProcess): boolean {
	return child.exitCode !== null || child.signalCode !== null;
}

/**
 * Build the ffmpeg argument list for an input
 *
 * @throws SourceFailureError for camera capture on unsupported platforms
 */
export function buildFfmpegArgs(
	input: FfmpegInput,
	config: Pick<FrameSourceConfig, 'width' | 'height' | 'frameRate' | 'channels'>,
	platform: NodeJS.Platform
): string[] {
	const args = ['-hide_banner', '-loglevel', 'error', '-nostdin'];

	if (input.kind === 'file') {
		// -re reads the file at its native rate, like a live feed
		args.push('-re', '-i', input.path);
	} else {
		const size = `${config.width}x${config.height}`;
		const rate = String(config.frameRate);
		switch (platform) {
			case 'linux':
				args.push('-f', 'v4l2', '-framerate', rate, '-video_size', size, '-i', `/dev/video${input.device}`);
				break;
			case 'darwin':
				args.push('-f', 'avfoundation', '-framerate', rate, '-video_size', size, '-i', `${input.device}:none`);
				break;
			default:
				throw new SourceFailureError(
					`camera:${input.device}`,
					`camera capture by index is not supported on ${platform}; pass a video file instead`
				);
		}
	}

	args.push(
		'-an',
		'-vf',
		`scale=${config.width}:${config.height}`,
		'-r',
		String(config.frameRate),
		'-pix_fmt',
		config.channels === 4 ? 'rgba' : 'rgb24',
		'-f',
		'rawvideo',
		'pipe:1'
	);

	return args;
}

/**
 * FfmpegFrameSource
 *
 * @example
 * ```typescript
 * const camera = new FfmpegFrameSource({ kind: 'camera', device: 0 }, { width: 160, height: 90 });
 * await camera.open();
 * ```
 */
export class FfmpegFrameSource implements FrameSource {
	readonly name: string;
	private readonly input: FfmpegInput;
	private readonly config: FrameSourceConfig;
	private readonly options: FfmpegSourceOptions;
	private process: CaptureProcess | null = null;
	private frames: StreamFrameSource | null = null;
	private stderrTail: string[] = [];
	private spawnError: Error | null = null;
	private closing = false;

	constructor(
		input: FfmpegInput,
		config: Partial<FrameSourceConfig> = {},
		options: Partial<FfmpegSourceOptions> = {}
	) {
		this.input = input;
		this.config = { ...DEFAULT_SOURCE_CONFIG, ...config };
		this.options = { ...DEFAULT_FFMPEG_OPTIONS, ...options };
		assertFrameShape(this.config);

		this.name = input.kind === 'camera' ? `camera:${input.device}` : `file:${input.path}`;
	}

	/** Last lines ffmpeg wrote to stderr */
	get diagnostics(): string {
		return this.stderrTail.join('\n');
	}

	async open(): Promise<FrameShape> {
		if (this.process) {
			throw new SourceFailureError(this.name, 'already open');
		}

		const args = buildFfmpegArgs(this.input, this.config, this.options.platform);
		const child = this.options.spawner(this.options.command, args);
		this.process = child;

		child.stderr?.setEncoding('utf8');
		child.stderr?.on('data', (chunk: string) => {
			const lines = chunk.split('\n').filter((line) => line.trim().length > 0);
			this.stderrTail = [...this.stderrTail, ...lines].slice(-STDERR_TAIL_LINES);
		});

		await new Promise<void>((resolve, reject) => {
			const onSpawn = () => {
				child.off('error', onError);
				resolve();
			};
			const onError = (error: Error) => {
				child.off('spawn', onSpawn);
				this.spawnError = error;
				reject(new SourceFailureError(this.name, `failed to start ${this.options.command}: ${error.message}`, { cause: error }));
			};
			child.once('spawn', onSpawn);
			child.once('error', onError);
		});

		child.on('error', (error: Error) => {
			this.spawnError = error;
		});

		const stdout = child.stdout;
		if (stdout === null) {
			throw new SourceFailureError(this.name, 'ffmpeg stdout is not piped');
		}

		this.frames = new StreamFrameSource(this.name, stdout, {
			width: this.config.width,
			height: this.config.height,
			channels: this.config.channels
		});

		console.log(`[FfmpegFrameSource] Started ${this.name} at ${this.config.width}x${this.config.height}@${this.config.frameRate}`);
		return this.frames.open();
	}

	async read(signal?: AbortSignal): Promise<RawFrame | null> {
		if (this.frames === null) {
			throw new SourceFailureError(this.name, 'read before open()');
		}

		const frame = await this.frames.read(signal);
		if (frame !== null || this.closing || signal?.aborted) {
			return frame;
		}

		// stdout ended: a clean exit is end of stream, anything else is a failure
		const exitCode = await this.waitForExit();
		if (exitCode !== 0 || this.spawnError) {
			const detail = this.diagnostics || this.spawnError?.message || 'no output';
			throw new SourceFailureError(this.name, `ffmpeg exited with code ${String(exitCode)}: ${detail}`);
		}
		return null;
	}

	async close(): Promise<void> {
		if (this.closing) return;
		this.closing = true;

		await this.frames?.close();
		const child = this.process;
		// A process that never spawned emits no reliable 'exit'
		if (child && this.spawnError === null && !hasExited(child)) {
			await this.terminate(child);
		}
		console.log(`[FfmpegFrameSource] Closed ${this.name}`);
	}

	private async terminate(child: CaptureProcess): Promise<void> {
		const exited = this.waitForExit();
		child.kill('SIGTERM');
		if (await settlesWithin(exited, this.options.killGraceMs)) {
			return;
		}

		console.warn(`[FfmpegFrameSource] ${this.name} still running ${this.options.killGraceMs}ms after SIGTERM, sending SIGKILL`);
		child.kill('SIGKILL');
		if (!(await settlesWithin(exited, this.options.killGraceMs))) {
			console.warn(`[FfmpegFrameSource] ${this.name} did not exit after SIGKILL`);
		}
	}

	private waitForExit(): Promise<number | null> {
		const child = this.process;
		if (child === null) {
			return Promise.resolve(null);
		}
		if (hasExited(child)) {
			return Promise.resolve(child.exitCode);
		}
		return new Promise<number | null>((resolve) => {
			child.once('exit', (code: number | null) => resolve(code));
		});
	}
}
