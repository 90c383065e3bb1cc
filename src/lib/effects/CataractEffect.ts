/**
 * Cataract - clouded lens
 *
 * Blur, yellow-brown tint and loss of contrast, all growing with severity.
 */

import { withPixels, type Frame, type FrameShape } from '../capture/Frame';
import type { EffectTransform } from './EffectTransform';
import { boxBlur, maxBlurRadius, mix } from './pixelOps';

export interface CataractState {
	/** Blur radius at severity 1 */
	maxRadius: number;
}

/** Per-channel multiplier of the fully yellowed lens */
const TINT: readonly [number, number, number] = [1.0, 0.9, 0.62];

/** Fraction of contrast lost at severity 1 */
const CONTRAST_LOSS = 0.55;

/** Luma the image washes out towards */
const HAZE = 170;

export const cataractEffect: EffectTransform<CataractState> = {
	id: 'cataract',
	label: 'Cataract',
	category: 'blur',
	module: import.meta.url,

	init(shape: FrameShape): CataractState {
		return { maxRadius: maxBlurRadius(shape, 24) };
	},

	apply(frame: Frame, severity: number, state: CataractState): Frame {
		const shape = { width: frame.width, height: frame.height, channels: frame.channels };
		const out = boxBlur(frame.data, shape, severity * state.maxRadius);
		const keep = 1 - CONTRAST_LOSS * severity;
		const { channels } = frame;

		for (let i = 0; i < out.length; i += channels) {
			for (let c = 0; c < 3; c++) {
				const hazed = HAZE + (out[i + c] - HAZE) * keep;
				out[i + c] = hazed * mix(1, TINT[c], severity);
			}
		}

		return withPixels(frame, out);
	}
};
