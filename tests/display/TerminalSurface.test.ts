/**
 * TerminalSurface Tests
 */

import { Writable } from 'node:stream';
import { setImmediate as tick } from 'node:timers/promises';
import { describe, it, expect } from 'vitest';
import type { Frame } from '$lib/capture/Frame';
import {
	TerminalSurface,
	redirectConsole,
	renderFrameRows,
	renderSlider,
	type SliderConfig
} from '$lib/display/TerminalSurface';

const SLIDER: SliderConfig = {
	width: 5,
	label: 'S',
	fillColor: [1, 1, 1],
	trackColor: [2, 2, 2],
	knobColor: [3, 3, 3]
};

const FILL = '\x1b[38;2;1;1;1m';
const TRACK = '\x1b[38;2;2;2;2m';
const KNOB = '\x1b[38;2;3;3;3m';
const RESET = '\x1b[0m';

function frameOf(width: number, height: number, pixels: number[]): Frame {
	return { width, height, channels: 3, data: new Uint8ClampedArray(pixels), timestamp: 0, sequence: 1 };
}

function collectingOutput(highWaterMark = 1 << 16) {
	const chunks: string[] = [];
	const output = new Writable({
		highWaterMark,
		write(chunk: Buffer, _encoding, callback) {
			chunks.push(chunk.toString());
			callback();
		}
	});
	return { output, chunks };
}

const INFO = { sequence: 7, severity: 0.5, repeated: false, tick: 1 };

describe('renderFrameRows', () => {
	it('should pair pixel rows and only emit escapes on colour changes', () => {
		const frame = frameOf(2, 2, [1, 2, 3, 1, 2, 3, 4, 5, 6, 7, 8, 9]);

		expect(renderFrameRows(frame)).toEqual([
			'\x1b[38;2;1;2;3m\x1b[48;2;4;5;6m▀\x1b[48;2;7;8;9m▀' + RESET
		]);
	});

	it('should draw an odd last row over the default background', () => {
		expect(renderFrameRows(frameOf(1, 1, [10, 20, 30]))).toEqual(['\x1b[38;2;10;20;30m\x1b[49m▀' + RESET]);
	});

	it('should produce ceil(height / 2) rows', () => {
		expect(renderFrameRows(frameOf(1, 3, [0, 0, 0, 0, 0, 0, 0, 0, 0]))).toHaveLength(2);
	});

	it('should ignore alpha', () => {
		const frame: Frame = { width: 1, height: 1, channels: 4, data: new Uint8ClampedArray([5, 6, 7, 0]), timestamp: 0, sequence: 1 };

		expect(renderFrameRows(frame)).toEqual(['\x1b[38;2;5;6;7m\x1b[49m▀' + RESET]);
	});
});

describe('renderSlider', () => {
	it('should place the knob proportionally', () => {
		expect(renderSlider(0.5, SLIDER)).toBe(`S ${FILL}━━${KNOB}●${TRACK}──${RESET}  50%`);
	});

	it('should clamp values outside [0, 1]', () => {
		expect(renderSlider(2, SLIDER)).toBe(`S ${FILL}━━━━${KNOB}●${TRACK}${RESET} 100%`);
		expect(renderSlider(-1, SLIDER)).toBe(`S ${FILL}${KNOB}●${TRACK}────${RESET}   0%`);
	});
});

describe('TerminalSurface', () => {
	const frame = frameOf(1, 1, [10, 20, 30]);
	const row = '\x1b[38;2;10;20;30m\x1b[49m▀' + RESET;

	it('should clear the screen and hide the cursor before the first frame only', () => {
		const { output, chunks } = collectingOutput();
		const surface = new TerminalSurface(output, { showStatus: false });

		surface.present(frame, INFO);
		surface.present(frame, { ...INFO, tick: 2 });

		expect(chunks).toEqual(['\x1b[?25l\x1b[2J\x1b[H' + row, '\x1b[H' + row]);
		expect(surface.presentedFrames).toBe(2);
	});

	it('should draw the status and slider lines', () => {
		const { output, chunks } = collectingOutput();
		const surface = new TerminalSurface(output, { slider: SLIDER });
		surface.setStatus('Glaucoma');

		surface.present(frame, { ...INFO, repeated: true });

		expect(chunks[0]).toBe(
			'\x1b[?25l\x1b[2J\x1b[H' + row + '\n\x1b[2KGlaucoma #7 (held)' + '\n\x1b[2K' + renderSlider(0.5, SLIDER)
		);
	});

	it('should skip frames until the output drains', async () => {
		const { output, chunks } = collectingOutput(1);
		const surface = new TerminalSurface(output, { showStatus: false });

		surface.present(frame, INFO);
		surface.present(frame, INFO);
		expect(surface.skippedFrames).toBe(1);

		await tick();
		surface.present(frame, INFO);

		expect(chunks).toHaveLength(2);
		expect(surface.presentedFrames).toBe(2);
	});

	it('should restore the cursor on close', () => {
		const { output, chunks } = collectingOutput();
		const surface = new TerminalSurface(output, { showStatus: false });
		surface.present(frame, INFO);

		surface.close();
		surface.close();

		expect(chunks.slice(1)).toEqual([`${RESET}\n\x1b[?25h`]);
	});

	it('should clear the screen on close when asked', () => {
		const { output, chunks } = collectingOutput();
		const surface = new TerminalSurface(output, { showStatus: false, clearOnClose: true });
		surface.present(frame, INFO);

		surface.close();

		expect(chunks[1]).toBe(`${RESET}\x1b[2J\x1b[H\x1b[?25h`);
	});

	it('should write nothing on close if nothing was presented', () => {
		const { output, chunks } = collectingOutput();

		new TerminalSurface(output).close();

		expect(chunks).toEqual([]);
	});

	it('should reject a slider narrower than two cells', () => {
		const { output } = collectingOutput();

		expect(() => new TerminalSurface(output, { slider: { ...SLIDER, width: 1 } })).toThrow(RangeError);
	});
});

describe('redirectConsole', () => {
	it('should route logs and warnings to the given stream until restored', () => {
		const { output, chunks } = collectingOutput();
		const original = console;

		const restore = redirectConsole(output);
		console.log('[WorkerLoop 0] ready');
		console.warn('[FramePipeline] slow');
		restore();

		expect(chunks).toEqual(['[WorkerLoop 0] ready\n', '[FramePipeline] slow\n']);
		expect(console).toBe(original);
	});
});
