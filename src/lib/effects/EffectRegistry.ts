/**
 * EffectRegistry - Lookup of effects by id
 *
 * Registration order is the cycling order used by the keyboard control.
 *
 * @example
 * ```typescript
 * const registry = new EffectRegistry();
 * registry.register(glaucomaEffect);
 * const effect = registry.require('glaucoma');
 * ```
 */

import type { AnyEffectTransform } from './EffectTransform';

export class EffectRegistry {
	private effects: Map<string, AnyEffectTransform> = new Map();

	/**
	 * Register an effect
	 *
	 * @throws Error if the id is already taken
	 */
	register(effect: AnyEffectTransform): void {
		if (this.effects.has(effect.id)) {
			throw new Error(`EffectRegistry: effect "${effect.id}" is already registered`);
		}
		this.effects.set(effect.id, effect);
	}

	/**
	 * Look up an effect that must exist
	 *
	 * @throws Error naming the known ids
	 */
	require(id: string): AnyEffectTransform {
		const effect = this.effects.get(id);
		if (!effect) {
			throw new Error(`Unknown effect "${id}". Available: ${this.ids().join(', ')}`);
		}
		return effect;
	}

	has(id: string): boolean {
		return this.effects.has(id);
	}

	getAll(): AnyEffectTransform[] {
		return [...this.effects.values()];
	}

	ids(): string[] {
		return [...this.effects.keys()];
	}

	/**
	 * Id `offset` places after `id` in registration order, wrapping around
	 *
	 * An unregistered `id` starts from the first effect.
	 */
	cycle(id: string, offset: number): string {
		const ids = this.ids();
		if (ids.length === 0) {
			throw new Error('EffectRegistry: no effects registered');
		}
		const index = Math.max(0, ids.indexOf(id));
		const next = (((index + offset) % ids.length) + ids.length) % ids.length;
		return ids[next];
	}

	get size(): number {
		return this.effects.size;
	}
}
