/**
 * EffectRegistry Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { EffectRegistry, createDefaultRegistry, isEffectTransform, loadableFrom } from '$lib/effects';
import { identityEffect, severityStampEffect, slowEffect } from '../helpers';

describe('EffectRegistry', () => {
	let registry: EffectRegistry;

	beforeEach(() => {
		registry = new EffectRegistry();
		registry.register(identityEffect);
		registry.register(severityStampEffect);
		registry.register(slowEffect(1));
	});

	it('should look effects up by id', () => {
		expect(registry.require('identity')).toBe(identityEffect);
		expect(registry.has('missing')).toBe(false);
		expect(registry.has('severity-stamp')).toBe(true);
		expect(registry.size).toBe(3);
	});

	it('should refuse a duplicate id', () => {
		expect(() => registry.register(identityEffect)).toThrow('EffectRegistry: effect "identity" is already registered');
	});

	it('should name the available ids when a required effect is missing', () => {
		expect(() => registry.require('missing')).toThrow('Unknown effect "missing". Available: identity, severity-stamp, slow');
	});

	it('should keep registration order', () => {
		expect(registry.ids()).toEqual(['identity', 'severity-stamp', 'slow']);
		expect(registry.getAll().map((e) => e.id)).toEqual(['identity', 'severity-stamp', 'slow']);
	});

	it('should cycle forwards and backwards with wrap-around', () => {
		expect(registry.cycle('identity', 1)).toBe('severity-stamp');
		expect(registry.cycle('slow', 1)).toBe('identity');
		expect(registry.cycle('identity', -1)).toBe('slow');
		expect(registry.cycle('severity-stamp', 5)).toBe('identity');
	});

	it('should cycle from the first effect when the id is unknown', () => {
		expect(registry.cycle('missing', 1)).toBe('severity-stamp');
	});

	it('should refuse to cycle an empty registry', () => {
		expect(() => new EffectRegistry().cycle('identity', 1)).toThrow('EffectRegistry: no effects registered');
	});
});

describe('createDefaultRegistry', () => {
	it('should register every built-in effect in cycling order', () => {
		expect(createDefaultRegistry().ids()).toEqual([
			'cataract',
			'glaucoma',
			'macular-degeneration',
			'diabetic-retinopathy',
			'protanopia',
			'deuteranopia',
			'tritanopia',
			'myopia'
		]);
	});

	it('should return an independent registry each time', () => {
		const first = createDefaultRegistry();
		first.register(identityEffect);

		expect(first.size).toBe(9);
		expect(createDefaultRegistry().size).toBe(8);
	});
});

describe('loadableFrom', () => {
	it('should record the module without touching the original effect', () => {
		const loadable = loadableFrom(identityEffect, 'file:///effects/identity.ts');

		expect(loadable.module).toBe('file:///effects/identity.ts');
		expect(loadable.id).toBe('identity');
		expect(identityEffect.module).toBeUndefined();
	});

	it('should be set on every built-in effect', () => {
		for (const effect of createDefaultRegistry().getAll()) {
			expect(effect.module).toMatch(/^file:.*Effect\.ts$/);
		}
	});
});

describe('isEffectTransform', () => {
	it('should accept effects and reject other module exports', () => {
		expect(isEffectTransform(identityEffect)).toBe(true);
		expect(isEffectTransform(createDefaultRegistry)).toBe(false);
		expect(isEffectTransform({ id: 'half', label: 'Half', init: () => null })).toBe(false);
		expect(isEffectTransform([1, 2, 3])).toBe(false);
		expect(isEffectTransform(null)).toBe(false);
	});
});
