/**
 * EffectThread - Runs one worker's effect on a `worker_threads` thread
 *
 * The thread is started on the first apply() and restarted after it
 * dies. Each request sends a copy of the Job's pixels (transferred, so the
 * copy is the only one made); the Job keeps its own frame intact for the
 * unprocessed fallback.
 *
 * Failures never escape as anything but a rejected apply():
 * - the effect throws: the thread reports it and keeps running
 * - the thread errors or exits: every pending apply() rejects and the
 *   next one starts a fresh thread
 *
 * Outside a build the thread script is TypeScript, so the thread is
 * started with the tsx loader.
 *
 * @module workers/EffectThread
 */

import { Worker } from 'node:worker_threads';
import { withPixels, type Frame } from '$lib/capture/Frame';
import type { AnyEffectTransform } from '$lib/effects/EffectTransform';
import { MessageType, type ApplyRequest, type EffectThreadResponse } from './effect-runner.types';
import type { EffectRunner } from './EffectRunner';

interface PendingApply {
	frame: Frame;
	resolve: (frame: Frame) => void;
	reject: (error: Error) => void;
}

interface RunningThread {
	worker: Worker;
	pending: Map<number, PendingApply>;
}

const WORKER_ENTRY = new URL('./effect-runner.worker.ts', import.meta.url);

const resolveTsExecArgv = (): string[] => ['--import', 'tsx'];

export class EffectThread implements EffectRunner {
	readonly mode = 'thread' as const;
	private readonly workerId: number;
	private readonly effect: AnyEffectTransform;
	private readonly module: string;
	private thread: RunningThread | null = null;
	private nextRequestId = 0;
	private threadsStarted = 0;
	private closed = false;

	constructor(workerId: number, effect: AnyEffectTransform, module: string) {
		this.workerId = workerId;
		this.effect = effect;
		this.module = module;
	}

	/** Threads started so far, restarts included */
	get startCount(): number {
		return this.threadsStarted;
	}

	apply(frame: Frame, severity: number): Promise<Frame> {
		if (this.closed) {
			return Promise.reject(new Error('effect thread closed'));
		}

		const thread = this.ensureThread();
		const id = ++this.nextRequestId;
		const pixels = new Uint8ClampedArray(frame.data);
		const request: ApplyRequest = {
			type: MessageType.Apply,
			id,
			module: this.module,
			effectId: this.effect.id,
			shape: { width: frame.width, height: frame.height, channels: frame.channels },
			severity,
			sequence: frame.sequence,
			timestamp: frame.timestamp,
			pixels
		};

		return new Promise<Frame>((resolve, reject) => {
			thread.pending.set(id, { frame, resolve, reject });
			const buffer = pixels.buffer;
			thread.worker.postMessage(request, buffer instanceof ArrayBuffer ? [buffer] : []);
		});
	}

	async close(): Promise<void> {
		this.closed = true;
		const thread = this.thread;
		if (thread === null) return;

		this.thread = null;
		this.rejectAll(thread, new Error('effect thread closed'));
		await thread.worker.terminate();
	}

	private ensureThread(): RunningThread {
		if (this.thread !== null) {
			return this.thread;
		}

		const worker = new Worker(WORKER_ENTRY, { execArgv: resolveTsExecArgv() });
		const thread: RunningThread = { worker, pending: new Map() };
		this.thread = thread;
		this.threadsStarted++;

		worker.on('message', (response: EffectThreadResponse) => this.settle(thread, response));
		worker.on('error', (error: Error) => {
			this.retire(thread, new Error(`effect thread failed: ${error.message}`, { cause: error }));
		});
		worker.on('exit', (code: number) => {
			this.retire(thread, new Error(`effect thread exited with code ${code}`));
		});

		if (this.threadsStarted > 1) {
			console.warn(`[WorkerLoop ${this.workerId}] Restarted effect thread for ${this.effect.id}`);
		}
		return thread;
	}

	private settle(thread: RunningThread, response: EffectThreadResponse): void {
		const task = thread.pending.get(response.id);
		if (!task) return;
		thread.pending.delete(response.id);

		if (response.type === MessageType.Failed) {
			const error = new Error(response.error);
			if (response.stack) error.stack = response.stack;
			task.reject(error);
			return;
		}

		if (response.initMs !== null) {
			console.log(
				`[WorkerLoop ${this.workerId}] ${this.effect.id} initialized for ${task.frame.width}x${task.frame.height} ` +
					`in ${response.initMs.toFixed(2)}ms (thread)`
			);
		}

		try {
			task.resolve(withPixels(task.frame, response.pixels));
		} catch (error: unknown) {
			task.reject(error instanceof Error ? error : new Error(String(error)));
		}
	}

	private retire(thread: RunningThread, error: Error): void {
		if (this.thread === thread) {
			this.thread = null;
		}
		this.rejectAll(thread, error);
	}

	private rejectAll(thread: RunningThread, error: Error): void {
		for (const task of thread.pending.values()) {
			task.reject(error);
		}
		thread.pending.clear();
	}
}
