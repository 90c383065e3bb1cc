/**
 * BoundedFrameQueue - Fixed-capacity FIFO with an explicit overflow policy
 *
 * Sits between the capture loop and the workers. Producers never wait:
 * `push()` either admits the item or sheds load according to the policy.
 * Consumers wait with a bounded timeout via `tryPop()`.
 *
 * Overflow policies:
 * - drop-newest: reject the incoming item (inbound default, so a slow
 *   worker always sees the frames that were already queued in order and
 *   never a backlog that grows without bound)
 * - drop-oldest: evict the head to admit the incoming item
 *
 * Drops are silent. They are counted in `dropCount` and nowhere else.
 *
 * @module core/BoundedFrameQueue
 */

/**
 * What to do when `push()` finds the queue full
 */
export type OverflowPolicy = 'drop-newest' | 'drop-oldest';

/**
 * Configuration for a bounded queue
 */
export interface BoundedQueueConfig {
	/** Maximum number of queued items (positive integer, or Infinity) */
	capacity: number;
	/** Overflow policy applied when full */
	overflow: OverflowPolicy;
}

/**
 * Default configuration (inbound frame queue)
 */
export const DEFAULT_QUEUE_CONFIG: BoundedQueueConfig = {
	capacity: 2,
	overflow: 'drop-newest'
};

interface PendingPop<T> {
	resolve: (item: T | null) => void;
	cleanup: () => void;
}

/**
 * BoundedFrameQueue
 *
 * @example
 * ```typescript
 * const inbound = new BoundedFrameQueue<Job>({ capacity: 1 });
 *
 * inbound.push(job);              // true, admitted
 * inbound.push(otherJob);         // false, dropped (drop-newest)
 *
 * const next = await inbound.tryPop(20);   // job, or null after 20ms
 * ```
 */
export class BoundedFrameQueue<T> {
	private readonly items: T[] = [];
	private readonly waiters: PendingPop<T>[] = [];
	private readonly config: BoundedQueueConfig;
	private _dropCount = 0;
	private _closed = false;

	constructor(config: Partial<BoundedQueueConfig> = {}) {
		this.config = { ...DEFAULT_QUEUE_CONFIG, ...config };

		const { capacity } = this.config;
		if (capacity !== Infinity && (!Number.isInteger(capacity) || capacity < 1)) {
			throw new RangeError(`Queue capacity must be a positive integer or Infinity, got ${capacity}`);
		}
	}

	/** Maximum number of queued items */
	get capacity(): number {
		return this.config.capacity;
	}

	/** Overflow policy in effect */
	get overflow(): OverflowPolicy {
		return this.config.overflow;
	}

	/** Number of items currently queued */
	get size(): number {
		return this.items.length;
	}

	/** Items shed by the overflow policy since construction */
	get dropCount(): number {
		return this._dropCount;
	}

	/** Whether close() has been called */
	get isClosed(): boolean {
		return this._closed;
	}

	/**
	 * Offer an item to the queue
	 *
	 * Never blocks. Returns false when the item was not admitted: the
	 * queue is closed, or it is full under drop-newest. Under drop-oldest
	 * the item is always admitted (returns true) and the evicted head is
	 * counted as a drop.
	 */
	push(item: T): boolean {
		if (this._closed) {
			return false;
		}

		// Hand straight to a waiting consumer; the queue is empty in that case
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter.cleanup();
			waiter.resolve(item);
			return true;
		}

		if (this.items.length >= this.config.capacity) {
			this._dropCount++;
			if (this.config.overflow === 'drop-newest') {
				return false;
			}
			this.items.shift();
		}

		this.items.push(item);
		return true;
	}

	/**
	 * Take the oldest item, waiting up to `timeoutMs` for one to arrive
	 *
	 * Resolves null on timeout, when `signal` aborts, or when the queue is
	 * closed and empty. Never rejects.
	 */
	tryPop(timeoutMs: number, signal?: AbortSignal): Promise<T | null> {
		if (this.items.length > 0) {
			return Promise.resolve(this.items.shift() ?? null);
		}

		if (this._closed || signal?.aborted || timeoutMs <= 0) {
			return Promise.resolve(null);
		}

		return new Promise<T | null>((resolve) => {
			const waiter: PendingPop<T> = { resolve, cleanup: () => undefined };
			const expire = () => {
				waiter.cleanup();
				this.removeWaiter(waiter);
				resolve(null);
			};

			const timer = setTimeout(expire, timeoutMs);
			waiter.cleanup = () => {
				clearTimeout(timer);
				signal?.removeEventListener('abort', expire);
			};

			signal?.addEventListener('abort', expire, { once: true });
			this.waiters.push(waiter);
		});
	}

	/**
	 * Remove and return every queued item
	 */
	clear(): T[] {
		return this.items.splice(0, this.items.length);
	}

	/**
	 * Stop admitting items
	 *
	 * Queued items can still be popped. Consumers waiting on an empty
	 * queue are released with null.
	 */
	close(): void {
		if (this._closed) return;
		this._closed = true;

		const waiters = this.waiters.splice(0, this.waiters.length);
		for (const waiter of waiters) {
			waiter.cleanup();
			waiter.resolve(null);
		}
	}

	private removeWaiter(waiter: PendingPop<T>): void {
		const index = this.waiters.indexOf(waiter);
		if (index !== -1) {
			this.waiters.splice(index, 1);
		}
	}
}
