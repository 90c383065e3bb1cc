/**
 * Diabetic retinopathy - dark floaters and patchy loss
 *
 * init() scatters seeded spots, each with an onset severity. A spot
 * appears once severity passes its onset and darkens as severity grows,
 * so the spots do not jump around when the slider moves.
 */

import { withPixels, type Frame, type FrameShape } from '../capture/Frame';
import { loadableFrom, type EffectTransform } from './EffectTransform';
import { createRandom } from './pixelOps';

export interface DiabeticRetinopathyState {
	/** Severity at which each pixel starts to darken; 2 where no spot covers it */
	onset: Float32Array;
	/** 0 at a spot's rim, 1 at its centre */
	depth: Float32Array;
}

/** Onset value for pixels no spot covers */
const NEVER = 2;

/** Pixels per spot */
const SPOT_DENSITY = 600;

/**
 * Create a diabetic retinopathy effect with its own spot layout
 */
export function createDiabeticRetinopathyEffect(seed = 0xd1ab): EffectTransform<DiabeticRetinopathyState> {
	return {
		id: 'diabetic-retinopathy',
		label: 'Diabetic retinopathy',
		category: 'distortion',

		init(shape: FrameShape): DiabeticRetinopathyState {
			const { width, height } = shape;
			const random = createRandom(seed);
			const onset = new Float32Array(width * height).fill(NEVER);
			const depth = new Float32Array(width * height);
			const spots = Math.max(6, Math.round((width * height) / SPOT_DENSITY));
			const scale = Math.min(width, height);

			for (let s = 0; s < spots; s++) {
				const cx = random() * width;
				const cy = random() * height;
				const radius = Math.max(1, (0.02 + random() * 0.06) * scale);
				const threshold = random() * 0.9;

				const x0 = Math.max(0, Math.floor(cx - radius));
				const x1 = Math.min(width - 1, Math.ceil(cx + radius));
				const y0 = Math.max(0, Math.floor(cy - radius));
				const y1 = Math.min(height - 1, Math.ceil(cy + radius));

				for (let y = y0; y <= y1; y++) {
					for (let x = x0; x <= x1; x++) {
						const d = Math.hypot(x + 0.5 - cx, y + 0.5 - cy) / radius;
						if (d >= 1) continue;
						const p = y * width + x;
						if (threshold < onset[p]) {
							onset[p] = threshold;
							depth[p] = 1 - d;
						}
					}
				}
			}

			return { onset, depth };
		},

		apply(frame: Frame, severity: number, state: DiabeticRetinopathyState): Frame {
			const { data, channels } = frame;
			const out = new Uint8ClampedArray(data);

			for (let p = 0; p < state.onset.length; p++) {
				const over = severity - state.onset[p];
				if (over <= 0) continue;
				const amount = Math.min(1, over * 3) * (0.35 + 0.6 * state.depth[p]);
				const i = p * channels;
				out[i] = data[i] * (1 - amount * 0.85);
				out[i + 1] = data[i + 1] * (1 - amount);
				out[i + 2] = data[i + 2] * (1 - amount);
			}

			return withPixels(frame, out);
		}
	};
}

export const diabeticRetinopathyEffect = loadableFrom(createDiabeticRetinopathyEffect(), import.meta.url);
