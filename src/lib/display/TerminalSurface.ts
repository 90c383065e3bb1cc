/**
 * TerminalSurface - Truecolor ANSI presentation sink
 *
 * Draws two pixel rows per text row with the upper half block: the
 * foreground colour paints the top pixel, the background the bottom one.
 * Below the image sit a status line and a severity slider.
 *
 * Writes respect stream backpressure: while the output has not drained,
 * further presents are skipped and counted rather than queued.
 *
 * @module display/TerminalSurface
 */

import { Console } from 'node:console';
import type { Writable } from 'node:stream';
import type { Frame } from '$lib/capture/Frame';
import type { PresentInfo, PresentationSink } from '$lib/core/PresentationLoop';

export type Rgb = readonly [number, number, number];

/**
 * Slider geometry and colours
 */
export interface SliderConfig {
	/** Track width in cells */
	width: number;
	/** Label drawn left of the track */
	label: string;
	fillColor: Rgb;
	trackColor: Rgb;
	knobColor: Rgb;
}

export interface TerminalSurfaceConfig {
	slider: SliderConfig;
	/** Draw the status and slider lines */
	showStatus: boolean;
	/** Clear the screen when the surface closes */
	clearOnClose: boolean;
}

export const DEFAULT_SLIDER_CONFIG: SliderConfig = {
	width: 40,
	label: 'Severity',
	fillColor: [230, 120, 40],
	trackColor: [70, 70, 70],
	knobColor: [255, 255, 255]
};

export const DEFAULT_TERMINAL_CONFIG: TerminalSurfaceConfig = {
	slider: DEFAULT_SLIDER_CONFIG,
	showStatus: true,
	clearOnClose: false
};

const ESC = '\x1b[';
const UPPER_HALF = '▀';
const RESET = `${ESC}0m`;

const fg = (c: Rgb) => `${ESC}38;2;${c[0]};${c[1]};${c[2]}m`;
const bg = (c: Rgb) => `${ESC}48;2;${c[0]};${c[1]};${c[2]}m`;

/**
 * Render a frame as half-block rows, one string per text row
 *
 * Colour escapes are emitted only when the colour changes along a row.
 * An odd last pixel row is drawn over the terminal's default background.
 */
export function renderFrameRows(frame: Frame): string[] {
	const { width, height, channels, data } = frame;
	const rows: string[] = [];

	for (let y = 0; y < height; y += 2) {
		let line = '';
		let lastTop = -1;
		let lastBottom = -1;
		const hasBottom = y + 1 < height;

		for (let x = 0; x < width; x++) {
			const t = (y * width + x) * channels;
			const top = (data[t] << 16) | (data[t + 1] << 8) | data[t + 2];
			if (top !== lastTop) {
				line += fg([data[t], data[t + 1], data[t + 2]]);
				lastTop = top;
			}

			if (hasBottom) {
				const b = ((y + 1) * width + x) * channels;
				const bottom = (data[b] << 16) | (data[b + 1] << 8) | data[b + 2];
				if (bottom !== lastBottom) {
					line += bg([data[b], data[b + 1], data[b + 2]]);
					lastBottom = bottom;
				}
			} else if (x === 0) {
				line += `${ESC}49m`;
			}

			line += UPPER_HALF;
		}

		rows.push(line + RESET);
	}

	return rows;
}

/**
 * Render the severity slider line
 *
 * The knob sits on cell round(value * (width - 1)); cells left of it are
 * filled, cells right of it are track.
 */
export function renderSlider(value: number, config: SliderConfig): string {
	const clamped = Math.max(0, Math.min(1, value));
	const knob = Math.round(clamped * (config.width - 1));
	const percent = `${Math.round(clamped * 100)}%`.padStart(4);

	return (
		`${config.label} ` +
		fg(config.fillColor) +
		'━'.repeat(knob) +
		fg(config.knobColor) +
		'●' +
		fg(config.trackColor) +
		'─'.repeat(config.width - 1 - knob) +
		RESET +
		` ${percent}`
	);
}

/**
 * Send every console method to `stream` until the returned restore is called
 *
 * Lifecycle logs go to stderr while a surface owns stdout, so they never
 * land inside a drawn frame.
 */
export function redirectConsole(stream: Writable): () => void {
	const original = globalThis.console;
	globalThis.console = new Console({ stdout: stream, stderr: stream });
	return () => {
		globalThis.console = original;
	};
}

/**
 * TerminalSurface
 *
 * @example
 * ```typescript
 * const surface = new TerminalSurface(process.stdout);
 * surface.setStatus('Glaucoma');
 * ```
 */
export class TerminalSurface implements PresentationSink {
	private readonly output: Writable;
	private readonly config: TerminalSurfaceConfig;
	private status = '';
	private started = false;
	private waitingForDrain = false;
	private _skipped = 0;
	private _presented = 0;

	constructor(output: Writable, config: Partial<TerminalSurfaceConfig> = {}) {
		this.output = output;
		this.config = { ...DEFAULT_TERMINAL_CONFIG, ...config };

		if (!Number.isInteger(this.config.slider.width) || this.config.slider.width < 2) {
			throw new RangeError(`slider width must be an integer >= 2, got ${this.config.slider.width}`);
		}
	}

	/** Presents skipped because the output had not drained */
	get skippedFrames(): number {
		return this._skipped;
	}

	get presentedFrames(): number {
		return this._presented;
	}

	/** Text shown left of the frame counters */
	setStatus(text: string): void {
		this.status = text;
	}

	present(frame: Frame, info: PresentInfo): void {
		if (this.waitingForDrain) {
			this._skipped++;
			return;
		}

		let screen = '';
		if (!this.started) {
			// Hide cursor, clear screen
			screen += `${ESC}?25l${ESC}2J`;
			this.started = true;
		}
		screen += `${ESC}H` + renderFrameRows(frame).join('\n');

		if (this.config.showStatus) {
			const flag = info.repeated ? ' (held)' : '';
			screen +=
				`\n${ESC}2K${this.status} #${info.sequence}${flag}` +
				`\n${ESC}2K${renderSlider(info.severity, this.config.slider)}`;
		}

		this._presented++;
		if (!this.output.write(screen)) {
			this.waitingForDrain = true;
			this.output.once('drain', () => {
				this.waitingForDrain = false;
			});
		}
	}

	close(): void {
		if (!this.started) return;
		const clear = this.config.clearOnClose ? `${ESC}2J${ESC}H` : '\n';
		// Restore colours and cursor
		this.output.write(`${RESET}${clear}${ESC}?25h`);
		this.started = false;
	}
}
