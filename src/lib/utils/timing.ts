/**
 * Timing helpers shared by the pipeline loops
 */

import { setImmediate as immediate } from 'node:timers/promises';

/**
 * Wait `ms` milliseconds, resolving early (never rejecting) if `signal` aborts
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
	if (ms <= 0 || signal?.aborted) {
		return Promise.resolve();
	}

	return new Promise<void>((resolve) => {
		const done = () => {
			clearTimeout(timer);
			signal?.removeEventListener('abort', done);
			resolve();
		};
		const timer = setTimeout(done, ms);
		signal?.addEventListener('abort', done, { once: true });
	});
}

/**
 * Whether `promise` settles within `ms` milliseconds
 *
 * The promise must not reject.
 */
export async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
	const controller = new AbortController();
	const settled = promise.then(() => true);
	const timedOut = delay(ms, controller.signal).then(() => false);
	const result = await Promise.race([settled, timedOut]);
	controller.abort();
	return result;
}

/**
 * Let queued timers and I/O callbacks run before continuing
 *
 * Awaiting an already-settled promise only yields to other microtasks,
 * which starves timers. Loops that may spin on ready data call this once
 * per iteration.
 */
export async function yieldToEventLoop(): Promise<void> {
	await immediate();
}

/**
 * Monotonic clock in milliseconds
 */
export function now(): number {
	return performance.now();
}
