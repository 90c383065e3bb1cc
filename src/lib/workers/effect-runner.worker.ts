/**
 * Effect Worker Thread
 *
 * Runs one worker's effect off the main thread, so a CPU-bound apply()
 * never holds up capture or the display tick.
 *
 * The effect is loaded by id from the module named in each request and
 * its init() state is kept here, rebuilt only when the effect or the
 * frame shape changes. Requests are handled strictly in order.
 *
 * Imports stay relative: this file is loaded by the tsx loader inside the
 * thread, outside the test bundler's aliases.
 */

import { parentPort, type MessagePort } from 'node:worker_threads';
import type { Frame, FrameShape } from '../capture/Frame';
import { EffectRegistry } from '../effects/EffectRegistry';
import { isEffectTransform, type AnyEffectTransform } from '../effects/EffectTransform';
import { MessageType, type ApplyRequest, type EffectThreadResponse } from './effect-runner.types';

interface ActiveEffect {
	key: string;
	effect: AnyEffectTransform;
	state: unknown;
}

function requirePort(): MessagePort {
	if (!parentPort) {
		throw new Error('Effect thread started without parentPort');
	}
	return parentPort;
}

const port = requirePort();

const registries = new Map<string, Promise<EffectRegistry>>();
let active: ActiveEffect | null = null;
let queue: Promise<void> = Promise.resolve();

/**
 * Registry of every effect a module exports
 */
async function loadRegistry(module: string): Promise<EffectRegistry> {
	const exports: unknown = await import(module);
	const registry = new EffectRegistry();
	if (typeof exports === 'object' && exports !== null) {
		for (const value of Object.values(exports)) {
			if (isEffectTransform(value) && !registry.has(value.id)) {
				registry.register(value);
			}
		}
	}
	if (registry.size === 0) {
		throw new Error(`${module} exports no effects`);
	}
	return registry;
}

function registryFor(module: string): Promise<EffectRegistry> {
	let registry = registries.get(module);
	if (!registry) {
		registry = loadRegistry(module);
		registries.set(module, registry);
		// A failed import is retried by the next request
		registry.catch(() => registries.delete(module));
	}
	return registry;
}

/**
 * Effect and init() state for a request, rebuilding the state when needed
 *
 * @returns the effect, its state, and the init time if init() ran
 */
async function resolveEffect(request: ApplyRequest): Promise<{ active: ActiveEffect; initMs: number | null }> {
	const { shape } = request;
	const key = `${request.module}#${request.effectId}@${shape.width}x${shape.height}x${shape.channels}`;
	if (active !== null && active.key === key) {
		return { active, initMs: null };
	}

	const effect = (await registryFor(request.module)).require(request.effectId);
	const startTime = performance.now();
	const state = effect.init({ width: shape.width, height: shape.height, channels: shape.channels });
	active = { key, effect, state };
	return { active, initMs: performance.now() - startTime };
}

function transferList(pixels: Uint8ClampedArray): ArrayBuffer[] {
	const buffer = pixels.buffer;
	if (buffer instanceof ArrayBuffer && pixels.byteOffset === 0 && pixels.byteLength === buffer.byteLength) {
		return [buffer];
	}
	return [];
}

async function handleApply(request: ApplyRequest): Promise<void> {
	let response: EffectThreadResponse;
	let transfer: ArrayBuffer[] = [];

	try {
		const { active: current, initMs } = await resolveEffect(request);
		const shape: FrameShape = request.shape;
		const frame: Frame = {
			width: shape.width,
			height: shape.height,
			channels: shape.channels,
			data: request.pixels,
			timestamp: request.timestamp,
			sequence: request.sequence
		};

		const output = await current.effect.apply(frame, request.severity, current.state);
		response = { type: MessageType.Applied, id: request.id, pixels: output.data, initMs };
		transfer = transferList(output.data);
	} catch (error: unknown) {
		response = {
			type: MessageType.Failed,
			id: request.id,
			error: error instanceof Error ? error.message : String(error),
			stack: error instanceof Error ? error.stack : undefined
		};
	}

	try {
		port.postMessage(response, transfer);
	} catch (error: unknown) {
		const failure: EffectThreadResponse = {
			type: MessageType.Failed,
			id: request.id,
			error: `effect output could not be sent: ${error instanceof Error ? error.message : String(error)}`
		};
		port.postMessage(failure);
	}
}

port.on('message', (request: ApplyRequest) => {
	queue = queue.then(() => handleApply(request));
});
