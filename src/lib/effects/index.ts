/**
 * Effects Module - Disease simulations and their registry
 *
 * @module effects
 */

import { cataractEffect } from './CataractEffect';
import { deuteranopiaEffect, protanopiaEffect, tritanopiaEffect } from './ColorDeficiencyEffect';
import { diabeticRetinopathyEffect } from './DiabeticRetinopathyEffect';
import { EffectRegistry } from './EffectRegistry';
import { glaucomaEffect } from './GlaucomaEffect';
import { macularDegenerationEffect } from './MacularDegenerationEffect';
import { myopiaEffect } from './MyopiaEffect';

export type { AnyEffectTransform, EffectCategory, EffectTransform } from './EffectTransform';
export { isEffectTransform, loadableFrom } from './EffectTransform';
export { EffectRegistry } from './EffectRegistry';
export { cataractEffect, type CataractState } from './CataractEffect';
export { glaucomaEffect, type GlaucomaState } from './GlaucomaEffect';
export {
	createMacularDegenerationEffect,
	macularDegenerationEffect,
	type MacularDegenerationState
} from './MacularDegenerationEffect';
export {
	createDiabeticRetinopathyEffect,
	diabeticRetinopathyEffect,
	type DiabeticRetinopathyState
} from './DiabeticRetinopathyEffect';
export {
	createColorDeficiencyEffect,
	interpolateMatrix,
	protanopiaEffect,
	deuteranopiaEffect,
	tritanopiaEffect,
	PROTANOPIA_MATRIX,
	DEUTERANOPIA_MATRIX,
	TRITANOPIA_MATRIX,
	type ColorMatrix,
	type ColorDeficiencyState
} from './ColorDeficiencyEffect';
export { myopiaEffect, type MyopiaState } from './MyopiaEffect';

/**
 * Registry holding every built-in effect
 *
 * Each call returns a fresh registry, so tests can mutate theirs freely.
 */
export function createDefaultRegistry(): EffectRegistry {
	const registry = new EffectRegistry();
	registry.register(cataractEffect);
	registry.register(glaucomaEffect);
	registry.register(macularDegenerationEffect);
	registry.register(diabeticRetinopathyEffect);
	registry.register(protanopiaEffect);
	registry.register(deuteranopiaEffect);
	registry.register(tritanopiaEffect);
	registry.register(myopiaEffect);
	return registry;
}
