/**
 * Macular degeneration - central scotoma with blurred surround
 *
 * The scotoma edge is irregular: a seeded low-frequency noise field,
 * built once in init(), perturbs the distance to the centre.
 */

import { withPixels, type Frame, type FrameShape } from '../capture/Frame';
import { loadableFrom, type EffectTransform } from './EffectTransform';
import { boxBlur, createRandom, maxBlurRadius, mix, radialDistanceField, smoothstep } from './pixelOps';

export interface MacularDegenerationState {
	distance: Float32Array;
	/** Smooth noise in [-1, 1] per pixel */
	noise: Float32Array;
	maxRadius: number;
}

/** Scotoma radius at severity 1, in units of the centre-to-corner distance */
const MAX_SCOTOMA = 0.45;

/** Noise amplitude on the scotoma edge */
const EDGE_JITTER = 0.08;

/** Noise lattice cells along the longer side */
const NOISE_CELLS = 6;

const SCOTOMA_GRAY = 38;

/**
 * Bilinearly interpolated value noise over a coarse lattice
 */
function valueNoise(shape: FrameShape, seed: number): Float32Array {
	const { width, height } = shape;
	const random = createRandom(seed);
	const cell = Math.max(width, height) / NOISE_CELLS;
	const cols = Math.ceil(width / cell) + 1;
	const rows = Math.ceil(height / cell) + 1;

	const lattice = new Float32Array(cols * rows);
	for (let i = 0; i < lattice.length; i++) {
		lattice[i] = random() * 2 - 1;
	}

	const noise = new Float32Array(width * height);
	for (let y = 0; y < height; y++) {
		const gy = y / cell;
		const y0 = Math.floor(gy);
		const ty = gy - y0;
		for (let x = 0; x < width; x++) {
			const gx = x / cell;
			const x0 = Math.floor(gx);
			const tx = gx - x0;
			const top = mix(lattice[y0 * cols + x0], lattice[y0 * cols + x0 + 1], tx);
			const bottom = mix(lattice[(y0 + 1) * cols + x0], lattice[(y0 + 1) * cols + x0 + 1], tx);
			noise[y * width + x] = mix(top, bottom, ty);
		}
	}
	return noise;
}

/**
 * Create a macular degeneration effect with its own blotch layout
 */
export function createMacularDegenerationEffect(seed = 0x5eed): EffectTransform<MacularDegenerationState> {
	return {
		id: 'macular-degeneration',
		label: 'Macular degeneration',
		category: 'field-loss',

		init(shape: FrameShape): MacularDegenerationState {
			return {
				distance: radialDistanceField(shape),
				noise: valueNoise(shape, seed),
				maxRadius: maxBlurRadius(shape, 40)
			};
		},

		apply(frame: Frame, severity: number, state: MacularDegenerationState): Frame {
			const shape = { width: frame.width, height: frame.height, channels: frame.channels };
			const out = boxBlur(frame.data, shape, severity * state.maxRadius);
			const radius = severity * MAX_SCOTOMA;
			const jitter = EDGE_JITTER * severity;
			const { channels } = frame;

			for (let p = 0; p < state.distance.length; p++) {
				const d = Math.max(0, state.distance[p] + state.noise[p] * jitter);
				const coverage = (1 - smoothstep(radius * 0.5, radius, d)) * 0.92;
				if (coverage === 0) continue;
				const i = p * channels;
				out[i] = mix(out[i], SCOTOMA_GRAY, coverage);
				out[i + 1] = mix(out[i + 1], SCOTOMA_GRAY, coverage);
				out[i + 2] = mix(out[i + 2], SCOTOMA_GRAY, coverage);
			}

			return withPixels(frame, out);
		}
	};
}

export const macularDegenerationEffect = loadableFrom(createMacularDegenerationEffect(), import.meta.url);
