/**
 * PresentationLoop Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Result } from '$lib/capture/Frame';
import { LatestResultSlot } from '$lib/core/LatestResultSlot';
import { PipelineDiagnostics } from '$lib/core/PipelineDiagnostics';
import { PresentationLoop, assertDisplayFps } from '$lib/core/PresentationLoop';
import { RecordingSink, makeResult } from '../helpers';

describe('assertDisplayFps', () => {
	it('should accept 1 through 120', () => {
		expect(() => assertDisplayFps(1)).not.toThrow();
		expect(() => assertDisplayFps(120)).not.toThrow();
	});

	it('should reject rates outside 1-120', () => {
		expect(() => assertDisplayFps(0)).toThrow(RangeError);
		expect(() => assertDisplayFps(121)).toThrow(RangeError);
		expect(() => assertDisplayFps(Number.NaN)).toThrow(RangeError);
	});
});

describe('PresentationLoop', () => {
	let slot: LatestResultSlot<Result>;
	let diagnostics: PipelineDiagnostics;
	let sink: RecordingSink;

	beforeEach(() => {
		slot = new LatestResultSlot<Result>();
		diagnostics = new PipelineDiagnostics();
		sink = new RecordingSink();
	});

	it('should derive its interval from displayFps', () => {
		const loop = new PresentationLoop(slot, sink, diagnostics, { displayFps: 50 });
		expect(loop.interval).toBe(20);
	});

	describe('tick', () => {
		it('should present a fresh result', async () => {
			const loop = new PresentationLoop(slot, sink, diagnostics, { displayFps: 100 });
			slot.publish(makeResult(1, 0.4));

			expect(await loop.tick()).toBe(true);

			expect(sink.presented).toHaveLength(1);
			expect(sink.presented[0]).toMatchObject({ sequence: 1, severity: 0.4, repeated: false, tick: 1 });
			expect(loop.lastShownSequence).toBe(1);
			expect(loop.lastFreshPresentTick).toBe(1);
		});

		it('should do nothing on timeout before the first frame', async () => {
			const loop = new PresentationLoop(slot, sink, diagnostics, { displayFps: 100 });

			expect(await loop.tick()).toBe(true);

			expect(sink.presented).toHaveLength(0);
			expect(diagnostics.snapshot().presentationTimeouts).toBe(1);
			expect(diagnostics.snapshot().repeatedFrames).toBe(0);
		});

		it('should re-present the last frame on timeout', async () => {
			const loop = new PresentationLoop(slot, sink, diagnostics, { displayFps: 100 });
			slot.publish(makeResult(4));
			await loop.tick();

			await loop.tick();

			expect(sink.presented.map((p) => [p.sequence, p.repeated])).toEqual([
				[4, false],
				[4, true]
			]);
			expect(diagnostics.snapshot().repeatedFrames).toBe(1);
			expect(diagnostics.snapshot().presentationTimeouts).toBe(1);
		});

		it('should stop once the slot is closed and empty', async () => {
			const loop = new PresentationLoop(slot, sink, diagnostics, { displayFps: 100 });
			slot.publish(makeResult(1));
			slot.close();

			expect(await loop.tick()).toBe(true);
			expect(await loop.tick()).toBe(false);
			expect(loop.ticks).toBe(1);
		});

		it('should log only the first sink failure', async () => {
			const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
			const failing = {
				present: vi.fn(() => {
					throw new Error('display gone');
				})
			};
			const loop = new PresentationLoop(slot, failing, diagnostics, { displayFps: 100 });
			slot.publish(makeResult(1));

			await loop.tick();
			await loop.tick();

			expect(failing.present).toHaveBeenCalledTimes(2);
			expect(errorSpy).toHaveBeenCalledTimes(1);
		});
	});

	describe('run', () => {
		it('should present results as they arrive and stop when the slot closes', async () => {
			const loop = new PresentationLoop(slot, sink, diagnostics, { displayFps: 100 });
			const running = loop.run(new AbortController().signal);

			slot.publish(makeResult(1));
			await sink.waitForFresh(1);
			slot.publish(makeResult(2));
			await sink.waitForFresh(2);
			slot.close();
			await running;

			expect(sink.fresh.map((p) => p.sequence)).toEqual([1, 2]);
			expect(loop.state).toBe('stopped');
		});

		it('should keep its tick rate while no results arrive', async () => {
			const loop = new PresentationLoop(slot, sink, diagnostics, { displayFps: 100 });
			const controller = new AbortController();
			slot.publish(makeResult(1));

			const running = loop.run(controller.signal);
			await new Promise((resolve) => setTimeout(resolve, 120));
			controller.abort();
			await running;

			// One fresh present, then repeats at roughly 10ms
			expect(sink.fresh).toHaveLength(1);
			expect(sink.presented.length).toBeGreaterThan(4);
			expect(sink.presented.every((p) => p.sequence === 1)).toBe(true);
		});

		it('should keep one period between presents after a fresh frame', async () => {
			const loop = new PresentationLoop(slot, sink, diagnostics, { displayFps: 20 });
			const controller = new AbortController();
			slot.publish(makeResult(1));

			const running = loop.run(controller.signal);
			await sink.waitForFresh(1);
			await new Promise((resolve) => setTimeout(resolve, 230));
			slot.publish(makeResult(2));
			await sink.waitForFresh(2);
			await new Promise((resolve) => setTimeout(resolve, 120));
			controller.abort();
			await running;

			expect(sink.fresh.map((p) => p.sequence)).toEqual([1, 2]);
			expect(sink.presented.length).toBeGreaterThan(6);
			expect(sink.maxPresentGap).toBeLessThan(75);
		});

		it('should discard a held result on cancellation', async () => {
			const loop = new PresentationLoop(slot, sink, diagnostics, { displayFps: 1 });
			const controller = new AbortController();
			slot.publish(makeResult(1));

			const running = loop.run(controller.signal);
			await sink.waitForFresh(1);
			slot.publish(makeResult(2));
			controller.abort();
			await running;

			expect(slot.hasPending).toBe(false);
			expect(sink.fresh.map((p) => p.sequence)).toEqual([1]);
		});
	});
});
