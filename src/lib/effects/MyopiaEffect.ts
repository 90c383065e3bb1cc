/**
 * Myopia - uniform distance blur
 */

import { withPixels, type Frame, type FrameShape } from '../capture/Frame';
import type { EffectTransform } from './EffectTransform';
import { boxBlur, maxBlurRadius } from './pixelOps';

export interface MyopiaState {
	maxRadius: number;
}

export const myopiaEffect: EffectTransform<MyopiaState> = {
	id: 'myopia',
	label: 'Myopia',
	category: 'blur',
	module: import.meta.url,

	init(shape: FrameShape): MyopiaState {
		return { maxRadius: maxBlurRadius(shape, 12) };
	},

	apply(frame: Frame, severity: number, state: MyopiaState): Frame {
		const shape = { width: frame.width, height: frame.height, channels: frame.channels };
		// Two passes approximate a gaussian closely enough for a defocus
		const radius = (severity * state.maxRadius) / 2;
		return withPixels(frame, boxBlur(boxBlur(frame.data, shape, radius), shape, radius));
	}
};
