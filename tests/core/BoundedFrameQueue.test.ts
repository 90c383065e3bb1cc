/**
 * BoundedFrameQueue Tests
 *
 * Overflow policies, waiting consumers, timeouts, abort and close.
 */

import { describe, it, expect } from 'vitest';
import { BoundedFrameQueue } from '$lib/core/BoundedFrameQueue';

describe('BoundedFrameQueue', () => {
	describe('construction', () => {
		it('should default to capacity 2, drop-newest', () => {
			const queue = new BoundedFrameQueue<number>();

			expect(queue.capacity).toBe(2);
			expect(queue.overflow).toBe('drop-newest');
			expect(queue.size).toBe(0);
			expect(queue.dropCount).toBe(0);
			expect(queue.isClosed).toBe(false);
		});

		it('should reject non-positive or fractional capacity', () => {
			expect(() => new BoundedFrameQueue({ capacity: 0 })).toThrow(RangeError);
			expect(() => new BoundedFrameQueue({ capacity: -3 })).toThrow(RangeError);
			expect(() => new BoundedFrameQueue({ capacity: 1.5 })).toThrow(RangeError);
		});

		it('should accept Infinity and never drop', () => {
			const queue = new BoundedFrameQueue<number>({ capacity: Infinity });
			for (let i = 0; i < 500; i++) {
				expect(queue.push(i)).toBe(true);
			}
			expect(queue.size).toBe(500);
			expect(queue.dropCount).toBe(0);
		});
	});

	describe('drop-newest', () => {
		it('should retain one item and drop k-1 when N=1 has no consumer', () => {
			const queue = new BoundedFrameQueue<number>({ capacity: 1 });
			const k = 7;

			const admitted = Array.from({ length: k }, (_, i) => queue.push(i + 1));

			expect(admitted).toEqual([true, false, false, false, false, false, false]);
			expect(queue.size).toBe(1);
			expect(queue.dropCount).toBe(k - 1);
		});

		it('should keep the oldest item when full', async () => {
			const queue = new BoundedFrameQueue<string>({ capacity: 2 });
			queue.push('a');
			queue.push('b');
			queue.push('c');

			expect(await queue.tryPop(0)).toBe('a');
			expect(await queue.tryPop(0)).toBe('b');
			expect(await queue.tryPop(0)).toBeNull();
		});
	});

	describe('drop-oldest', () => {
		it('should evict the head to admit the newest item', async () => {
			const queue = new BoundedFrameQueue<string>({ capacity: 2, overflow: 'drop-oldest' });

			expect(queue.push('a')).toBe(true);
			expect(queue.push('b')).toBe(true);
			expect(queue.push('c')).toBe(true);

			expect(queue.dropCount).toBe(1);
			expect(await queue.tryPop(0)).toBe('b');
			expect(await queue.tryPop(0)).toBe('c');
		});
	});

	describe('tryPop', () => {
		it('should resolve immediately with a queued item', async () => {
			const queue = new BoundedFrameQueue<number>();
			queue.push(42);

			expect(await queue.tryPop(1000)).toBe(42);
			expect(queue.size).toBe(0);
		});

		it('should resolve null after the timeout when empty', async () => {
			const queue = new BoundedFrameQueue<number>();
			const started = Date.now();

			const item = await queue.tryPop(15);

			expect(item).toBeNull();
			expect(Date.now() - started).toBeGreaterThanOrEqual(10);
		});

		it('should hand a pushed item straight to a waiting consumer', async () => {
			const queue = new BoundedFrameQueue<number>({ capacity: 1 });
			const pending = queue.tryPop(1000);

			expect(queue.push(5)).toBe(true);
			expect(await pending).toBe(5);
			expect(queue.size).toBe(0);
			expect(queue.dropCount).toBe(0);
		});

		it('should serve waiting consumers in arrival order', async () => {
			const queue = new BoundedFrameQueue<number>();
			const first = queue.tryPop(1000);
			const second = queue.tryPop(1000);

			queue.push(1);
			queue.push(2);

			expect(await first).toBe(1);
			expect(await second).toBe(2);
		});

		it('should resolve null when the signal aborts', async () => {
			const queue = new BoundedFrameQueue<number>();
			const controller = new AbortController();
			const pending = queue.tryPop(10_000, controller.signal);

			controller.abort();

			expect(await pending).toBeNull();
			// The aborted waiter must not swallow later items
			queue.push(9);
			expect(queue.size).toBe(1);
		});

		it('should resolve null immediately for an already-aborted signal', async () => {
			const queue = new BoundedFrameQueue<number>();
			const controller = new AbortController();
			controller.abort();

			expect(await queue.tryPop(10_000, controller.signal)).toBeNull();
		});

		it('should not lose an item pushed after a waiter timed out', async () => {
			const queue = new BoundedFrameQueue<number>();
			expect(await queue.tryPop(5)).toBeNull();

			queue.push(3);
			expect(queue.size).toBe(1);
			expect(await queue.tryPop(0)).toBe(3);
		});
	});

	describe('close', () => {
		it('should release waiting consumers with null', async () => {
			const queue = new BoundedFrameQueue<number>();
			const pending = queue.tryPop(10_000);

			queue.close();

			expect(await pending).toBeNull();
			expect(queue.isClosed).toBe(true);
		});

		it('should still hand out queued items after close', async () => {
			const queue = new BoundedFrameQueue<number>();
			queue.push(1);
			queue.close();

			expect(await queue.tryPop(100)).toBe(1);
			expect(await queue.tryPop(100)).toBeNull();
		});

		it('should refuse pushes after close without counting drops', () => {
			const queue = new BoundedFrameQueue<number>({ capacity: 1 });
			queue.close();

			expect(queue.push(1)).toBe(false);
			expect(queue.dropCount).toBe(0);
			expect(queue.size).toBe(0);
		});
	});

	describe('clear', () => {
		it('should remove and return every queued item', () => {
			const queue = new BoundedFrameQueue<number>({ capacity: 3 });
			queue.push(1);
			queue.push(2);

			expect(queue.clear()).toEqual([1, 2]);
			expect(queue.size).toBe(0);
		});
	});
});
