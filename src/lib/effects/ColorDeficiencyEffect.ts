/**
 * Color vision deficiency - dichromacy simulation
 *
 * Machado, Oliveira and Fernandes (2009) matrices at full severity,
 * blended from identity by the severity value and applied in linear RGB.
 */

import { withPixels, type Frame } from '../capture/Frame';
import { buildLinearTable, linearToSrgbByte } from '../utils/colorConversion';
import { loadableFrom, type EffectTransform } from './EffectTransform';
import { mix } from './pixelOps';

/** Row-major 3x3 matrix */
export type ColorMatrix = readonly [number, number, number, number, number, number, number, number, number];

export interface ColorDeficiencyState {
	/** sRGB byte → linear component */
	toLinear: Float32Array;
}

const IDENTITY: ColorMatrix = [1, 0, 0, 0, 1, 0, 0, 0, 1];

export const PROTANOPIA_MATRIX: ColorMatrix = [
	0.152286, 1.052583, -0.204868,
	0.114503, 0.786281, 0.099216,
	-0.003882, -0.048116, 1.051998
];

export const DEUTERANOPIA_MATRIX: ColorMatrix = [
	0.367322, 0.860646, -0.227968,
	0.280085, 0.672501, 0.047413,
	-0.01182, 0.04294, 0.968881
];

export const TRITANOPIA_MATRIX: ColorMatrix = [
	1.255528, -0.076749, -0.178779,
	-0.078411, 0.930809, 0.147602,
	0.004733, 0.691367, 0.3039
];

/**
 * Blend identity towards `matrix` by `t`
 */
export function interpolateMatrix(matrix: ColorMatrix, t: number): number[] {
	return IDENTITY.map((value, i) => mix(value, matrix[i], t));
}

export function createColorDeficiencyEffect(
	id: string,
	label: string,
	matrix: ColorMatrix
): EffectTransform<ColorDeficiencyState> {
	return {
		id,
		label,
		category: 'color',

		init(): ColorDeficiencyState {
			return { toLinear: buildLinearTable() };
		},

		apply(frame: Frame, severity: number, state: ColorDeficiencyState): Frame {
			const m = interpolateMatrix(matrix, severity);
			const { data, channels } = frame;
			const lut = state.toLinear;
			const out = new Uint8ClampedArray(data);

			for (let i = 0; i < data.length; i += channels) {
				const r = lut[data[i]];
				const g = lut[data[i + 1]];
				const b = lut[data[i + 2]];
				out[i] = linearToSrgbByte(m[0] * r + m[1] * g + m[2] * b);
				out[i + 1] = linearToSrgbByte(m[3] * r + m[4] * g + m[5] * b);
				out[i + 2] = linearToSrgbByte(m[6] * r + m[7] * g + m[8] * b);
			}

			return withPixels(frame, out);
		}
	};
}

export const protanopiaEffect = loadableFrom(
	createColorDeficiencyEffect('protanopia', 'Protanopia (red-blind)', PROTANOPIA_MATRIX),
	import.meta.url
);
export const deuteranopiaEffect = loadableFrom(
	createColorDeficiencyEffect('deuteranopia', 'Deuteranopia (green-blind)', DEUTERANOPIA_MATRIX),
	import.meta.url
);
export const tritanopiaEffect = loadableFrom(
	createColorDeficiencyEffect('tritanopia', 'Tritanopia (blue-blind)', TRITANOPIA_MATRIX),
	import.meta.url
);
