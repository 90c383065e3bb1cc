/**
 * Glaucoma - peripheral field loss closing in towards tunnel vision
 *
 * The distance field is computed once per shape; apply() only thresholds
 * it against a severity-dependent radius.
 */

import { withPixels, type Frame, type FrameShape } from '../capture/Frame';
import type { EffectTransform } from './EffectTransform';
import { radialDistanceField, smoothstep } from './pixelOps';

export interface GlaucomaState {
	/** Normalised distance from centre per pixel, corners at 1 */
	distance: Float32Array;
}

/** Radius of the clear field left at severity 1 */
const MIN_FIELD = 0.12;

/** Width of the dimming band at the field edge */
const FALLOFF = 0.25;

export const glaucomaEffect: EffectTransform<GlaucomaState> = {
	id: 'glaucoma',
	label: 'Glaucoma',
	category: 'field-loss',
	module: import.meta.url,

	init(shape: FrameShape): GlaucomaState {
		return { distance: radialDistanceField(shape) };
	},

	apply(frame: Frame, severity: number, state: GlaucomaState): Frame {
		// At severity 0 the whole frame, corners included, stays in the clear field
		const edge = 1 + FALLOFF - severity * (1 + FALLOFF - MIN_FIELD);
		const { data, channels } = frame;
		const out = new Uint8ClampedArray(data);

		for (let p = 0; p < state.distance.length; p++) {
			const visible = 1 - smoothstep(edge - FALLOFF, edge, state.distance[p]);
			if (visible === 1) continue;
			const i = p * channels;
			out[i] = data[i] * visible;
			out[i + 1] = data[i + 1] * visible;
			out[i + 2] = data[i + 2] * visible;
		}

		return withPixels(frame, out);
	}
};
