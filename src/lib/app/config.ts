/**
 * Command-line configuration
 *
 * Flags are read with node:util parseArgs and validated with a zod
 * schema; every numeric flag arrives as a string and is coerced.
 */

import { parseArgs } from 'node:util';
import { z } from 'zod';
import { MAX_WORKERS, type PipelineConfig } from '$lib/core/FramePipeline';
import { MAX_DISPLAY_FPS, MIN_DISPLAY_FPS } from '$lib/core/PresentationLoop';

export type SourceKind = 'synthetic' | 'camera' | 'file';

/**
 * Validated application settings
 */
export interface AppConfig {
	effect: string;
	severity: number;
	source: SourceKind;
	device: number;
	file: string | null;
	width: number;
	height: number;
	frameRate: number;
	/** Stop the synthetic source after this many frames */
	frames: number | null;
	pipeline: Pick<PipelineConfig, 'displayFps' | 'workerCount' | 'inboundCapacity'>;
	/** Listen for keypresses */
	keyboard: boolean;
	help: boolean;
}

export const appConfigSchema = z
	.object({
		effect: z.string().min(1).default('glaucoma'),
		severity: z.coerce.number().min(0).max(1).default(0.5),
		source: z.enum(['synthetic', 'camera', 'file']).default('synthetic'),
		device: z.coerce.number().int().nonnegative().default(0),
		file: z.string().min(1).optional(),
		width: z.coerce.number().int().positive().max(1920).default(96),
		height: z.coerce.number().int().positive().max(1080).default(54),
		'frame-rate': z.coerce.number().positive().max(240).default(30),
		frames: z.coerce.number().int().positive().optional(),
		fps: z.coerce.number().min(MIN_DISPLAY_FPS).max(MAX_DISPLAY_FPS).default(30),
		workers: z.coerce.number().int().min(1).max(MAX_WORKERS).default(1),
		queue: z.coerce.number().int().min(1).max(64).default(2),
		'no-keys': z.boolean().default(false),
		help: z.boolean().default(false)
	})
	.superRefine((value, ctx) => {
		if (value.source === 'file' && value.file === undefined) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['file'], message: 'required when --source is file' });
		}
	});

/**
 * Invalid command line
 */
export class ConfigError extends Error {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid options:\n  ${issues.join('\n  ')}`);
		this.name = 'ConfigError';
		this.issues = issues;
	}
}

export const USAGE = `Usage: vision-sim [options]

  --effect <id>          effect to simulate (default glaucoma)
  --severity <0..1>      initial severity (default 0.5)
  --source <kind>        synthetic | camera | file (default synthetic)
  --device <n>           camera index (default 0)
  --file <path>          video file, or raw .rgb/.rgba dump
  --width <px>           frame width (default 96)
  --height <px>          frame height (default 54)
  --frame-rate <fps>     capture rate (default 30)
  --frames <n>           stop the synthetic source after n frames
  --fps <1..120>         display rate (default 30)
  --workers <n>          effect workers (default 1)
  --queue <n>            inbound queue capacity (default 2)
  --no-keys              ignore the keyboard
  --help                 show this help`;

/**
 * Parse and validate command-line arguments
 *
 * @throws ConfigError listing every invalid flag
 */
export function parseAppConfig(argv: string[]): AppConfig {
	let values: Record<string, string | boolean | undefined>;
	try {
		({ values } = parseArgs({
			args: argv,
			strict: true,
			allowPositionals: false,
			options: {
				effect: { type: 'string', short: 'e' },
				severity: { type: 'string', short: 's' },
				source: { type: 'string' },
				device: { type: 'string', short: 'd' },
				file: { type: 'string', short: 'f' },
				width: { type: 'string' },
				height: { type: 'string' },
				'frame-rate': { type: 'string' },
				frames: { type: 'string' },
				fps: { type: 'string' },
				workers: { type: 'string', short: 'w' },
				queue: { type: 'string' },
				'no-keys': { type: 'boolean' },
				help: { type: 'boolean', short: 'h' }
			}
		}));
	} catch (error: unknown) {
		throw new ConfigError([error instanceof Error ? error.message : String(error)]);
	}

	const parsed = appConfigSchema.safeParse(values);
	if (!parsed.success) {
		throw new ConfigError(
			parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`)
		);
	}

	const v = parsed.data;
	return {
		effect: v.effect,
		severity: v.severity,
		source: v.source,
		device: v.device,
		file: v.file ?? null,
		width: v.width,
		height: v.height,
		frameRate: v['frame-rate'],
		frames: v.frames ?? null,
		pipeline: {
			displayFps: v.fps,
			workerCount: v.workers,
			inboundCapacity: v.queue
		},
		keyboard: !v['no-keys'],
		help: v.help
	};
}
