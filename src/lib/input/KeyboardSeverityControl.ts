/**
 * KeyboardSeverityControl - Keypresses to severity and effect changes
 *
 * Keys:
 *   ← / →, - / +    step severity down / up
 *   0-9             set severity to that many tenths (0 is off)
 *   n / p           next / previous effect
 *   q, Ctrl-C       quit
 *
 * @module input/KeyboardSeverityControl
 */

import { emitKeypressEvents, type Key } from 'node:readline';
import type { Readable } from 'node:stream';
import type { SeverityParameter } from '$lib/stores/severityStore';

/**
 * What a key asks for
 */
export type KeyAction =
	| { type: 'adjust'; delta: number }
	| { type: 'set'; value: number }
	| { type: 'cycle'; offset: number }
	| { type: 'quit' };

/**
 * Input stream; a TTY is switched to raw mode while attached
 */
export interface KeyInput extends Readable {
	isTTY?: boolean;
	setRawMode?(mode: boolean): unknown;
}

export interface KeyboardControlHandlers {
	severity: SeverityParameter;
	/** Switch effect by `offset` places in the registry */
	onCycle(offset: number): void;
	onQuit(): void;
}

export interface KeyboardControlConfig {
	/** Severity change per arrow press */
	step: number;
}

export const DEFAULT_KEYBOARD_CONFIG: KeyboardControlConfig = {
	step: 0.05
};

/**
 * Map one keypress to an action, or null for keys with no binding
 */
export function mapKey(str: string | undefined, key: Key | undefined, step: number): KeyAction | null {
	if (key?.ctrl && key.name === 'c') {
		return { type: 'quit' };
	}

	switch (key?.name) {
		case 'left':
		case 'down':
			return { type: 'adjust', delta: -step };
		case 'right':
		case 'up':
			return { type: 'adjust', delta: step };
		case 'q':
		case 'escape':
			return { type: 'quit' };
		case 'n':
			return { type: 'cycle', offset: 1 };
		case 'p':
			return { type: 'cycle', offset: -1 };
	}

	if (str === '-' || str === '_') {
		return { type: 'adjust', delta: -step };
	}
	if (str === '+' || str === '=') {
		return { type: 'adjust', delta: step };
	}
	if (str !== undefined && /^[0-9]$/.test(str)) {
		return { type: 'set', value: Number(str) / 10 };
	}

	return null;
}

export class KeyboardSeverityControl {
	private readonly input: KeyInput;
	private readonly handlers: KeyboardControlHandlers;
	private readonly config: KeyboardControlConfig;
	private attached = false;
	private rawMode = false;

	private readonly onKeypress = (str: string | undefined, key: Key | undefined) => {
		const action = mapKey(str, key, this.config.step);
		if (action) {
			this.dispatch(action);
		}
	};

	constructor(input: KeyInput, handlers: KeyboardControlHandlers, config: Partial<KeyboardControlConfig> = {}) {
		this.input = input;
		this.handlers = handlers;
		this.config = { ...DEFAULT_KEYBOARD_CONFIG, ...config };

		if (!(this.config.step > 0 && this.config.step <= 1)) {
			throw new RangeError(`step must be in (0, 1], got ${this.config.step}`);
		}
	}

	get isAttached(): boolean {
		return this.attached;
	}

	/**
	 * Start listening for keypresses
	 */
	attach(): void {
		if (this.attached) return;
		this.attached = true;

		emitKeypressEvents(this.input);
		if (this.input.isTTY && this.input.setRawMode) {
			this.input.setRawMode(true);
			this.rawMode = true;
		}
		this.input.on('keypress', this.onKeypress);
		this.input.resume();
	}

	/**
	 * Stop listening and restore the terminal mode
	 */
	detach(): void {
		if (!this.attached) return;
		this.attached = false;

		this.input.off('keypress', this.onKeypress);
		if (this.rawMode && this.input.setRawMode) {
			this.input.setRawMode(false);
			this.rawMode = false;
		}
		this.input.pause();
	}

	/**
	 * Apply an action
	 */
	dispatch(action: KeyAction): void {
		switch (action.type) {
			case 'adjust':
				this.handlers.severity.adjust(action.delta);
				break;
			case 'set':
				this.handlers.severity.set(action.value);
				break;
			case 'cycle':
				this.handlers.onCycle(action.offset);
				break;
			case 'quit':
				this.handlers.onQuit();
				break;
		}
	}
}
