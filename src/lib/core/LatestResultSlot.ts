/**
 * LatestResultSlot - Single-slot, latest-wins handoff from workers to presentation
 *
 * Holds at most one unclaimed result. A newer result overwrites an
 * unclaimed older one, so presentation always picks up the most recent
 * completed work and never waits behind a backlog.
 *
 * Ordering is enforced here: a result is discarded (counted as stale) if
 * its sequence number is not greater than both the result currently held
 * and the last one taken. With several workers finishing out of order, a
 * late-arriving older result can never displace or follow a newer one.
 *
 * @module core/LatestResultSlot
 */

/**
 * Anything carrying a capture sequence number
 */
export interface Sequenced {
	readonly sequence: number;
}

interface PendingTake<T> {
	resolve: (item: T | null) => void;
	cleanup: () => void;
}

/**
 * LatestResultSlot
 *
 * @example
 * ```typescript
 * const slot = new LatestResultSlot<Result>();
 *
 * slot.publish(result7);
 * slot.publish(result9);   // replaces 7
 * slot.publish(result8);   // stale, discarded
 *
 * const next = await slot.take(33);  // result9
 * ```
 */
export class LatestResultSlot<T extends Sequenced> {
	private held: T | null = null;
	private waiter: PendingTake<T> | null = null;
	private _lastTakenSequence = 0;
	private _staleCount = 0;
	private _replacedCount = 0;
	private _closed = false;

	/** Sequence of the most recent result handed to take() (0 before any) */
	get lastTakenSequence(): number {
		return this._lastTakenSequence;
	}

	/** Results discarded because a newer one was already held or taken */
	get staleCount(): number {
		return this._staleCount;
	}

	/** Unclaimed results overwritten by a newer one */
	get replacedCount(): number {
		return this._replacedCount;
	}

	/** Whether a result is waiting to be taken */
	get hasPending(): boolean {
		return this.held !== null;
	}

	/** Sequence of the held result, or null */
	get pendingSequence(): number | null {
		return this.held?.sequence ?? null;
	}

	/** Whether close() has been called */
	get isClosed(): boolean {
		return this._closed;
	}

	/**
	 * Offer a result
	 *
	 * @returns true if the result is now the one presentation will see next
	 */
	publish(result: T): boolean {
		if (this._closed) {
			return false;
		}

		const floor = Math.max(this._lastTakenSequence, this.held?.sequence ?? 0);
		if (result.sequence <= floor) {
			this._staleCount++;
			return false;
		}

		if (this.waiter) {
			const waiter = this.waiter;
			this.waiter = null;
			waiter.cleanup();
			this._lastTakenSequence = result.sequence;
			waiter.resolve(result);
			return true;
		}

		if (this.held !== null) {
			this._replacedCount++;
		}
		this.held = result;
		return true;
	}

	/**
	 * Claim the held result, waiting up to `timeoutMs` for one
	 *
	 * Resolves null on timeout, when `signal` aborts, or when the slot is
	 * closed and empty. Only one taker may wait at a time; a second
	 * concurrent take() resolves null immediately.
	 */
	take(timeoutMs: number, signal?: AbortSignal): Promise<T | null> {
		if (this.held !== null) {
			const result = this.held;
			this.held = null;
			this._lastTakenSequence = result.sequence;
			return Promise.resolve(result);
		}

		if (this._closed || signal?.aborted || timeoutMs <= 0 || this.waiter !== null) {
			return Promise.resolve(null);
		}

		return new Promise<T | null>((resolve) => {
			const waiter: PendingTake<T> = { resolve, cleanup: () => undefined };
			const expire = () => {
				waiter.cleanup();
				if (this.waiter === waiter) {
					this.waiter = null;
				}
				resolve(null);
			};

			const timer = setTimeout(expire, timeoutMs);
			waiter.cleanup = () => {
				clearTimeout(timer);
				signal?.removeEventListener('abort', expire);
			};

			signal?.addEventListener('abort', expire, { once: true });
			this.waiter = waiter;
		});
	}

	/**
	 * Stop accepting results
	 *
	 * A held result can still be taken. A waiting taker is released with null.
	 */
	close(): void {
		if (this._closed) return;
		this._closed = true;

		if (this.waiter) {
			const waiter = this.waiter;
			this.waiter = null;
			waiter.cleanup();
			waiter.resolve(null);
		}
	}

	/**
	 * Drop the held result without presenting it
	 */
	discard(): T | null {
		const result = this.held;
		this.held = null;
		return result;
	}
}
