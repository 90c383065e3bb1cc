/**
 * vision-sim entry point
 *
 *   tsx src/main.ts --effect cataract --severity 0.6
 *   tsx src/main.ts --source camera --device 0 --effect protanopia
 */

import { FfmpegFrameSource, SyntheticFrameSource, createFileFrameSource, type FrameSource } from '$lib/capture';
import { ConfigError, USAGE, parseAppConfig, type AppConfig } from '$lib/app/config';
import { VisionSimulator } from '$lib/app/VisionSimulator';
import { TerminalSurface, redirectConsole } from '$lib/display/TerminalSurface';
import { createDefaultRegistry } from '$lib/effects';
import { KeyboardSeverityControl } from '$lib/input/KeyboardSeverityControl';
import { SeverityParameter } from '$lib/stores/severityStore';

function sourceFactory(config: AppConfig): () => FrameSource {
	const shape = { width: config.width, height: config.height, channels: 3 as const };
	switch (config.source) {
		case 'camera':
			return () => new FfmpegFrameSource({ kind: 'camera', device: config.device }, { ...shape, frameRate: config.frameRate });
		case 'file':
			return () => createFileFrameSource({ ...shape, path: config.file, frameRate: config.frameRate });
		case 'synthetic':
			return () => new SyntheticFrameSource({ ...shape, frameRate: config.frameRate, frameLimit: config.frames });
	}
}

async function main(argv: string[]): Promise<number> {
	let config: AppConfig;
	try {
		config = parseAppConfig(argv);
	} catch (error: unknown) {
		if (error instanceof ConfigError) {
			console.error(error.message);
			console.error(USAGE);
			return 2;
		}
		throw error;
	}

	if (config.help) {
		console.log(USAGE);
		return 0;
	}

	const registry = createDefaultRegistry();
	if (!registry.has(config.effect)) {
		console.error(`Unknown effect "${config.effect}". Available:`);
		for (const effect of registry.getAll()) {
			console.error(`  ${effect.id.padEnd(24)}${effect.label}`);
		}
		return 2;
	}

	const surface = new TerminalSurface(process.stdout);
	const restoreConsole = redirectConsole(process.stderr);
	const simulator = new VisionSimulator({
		registry,
		createSource: sourceFactory(config),
		sink: surface,
		severity: new SeverityParameter(config.severity),
		pipeline: config.pipeline
	});

	let quitting = false;
	const finished = new Promise<void>((resolve) => {
		simulator.subscribe((event) => {
			switch (event.type) {
				case 'started':
					surface.setStatus(event.effect.label);
					break;
				case 'stopped':
					if (event.outcome.reason !== 'cancelled' || quitting) resolve();
					break;
				case 'failed':
					resolve();
					break;
			}
		});
	});

	const quit = () => {
		if (quitting) return;
		quitting = true;
		simulator.stop().catch((error: unknown) => {
			console.error('[main] Stop failed:', error instanceof Error ? error.message : String(error));
		});
	};

	const keyboard = new KeyboardSeverityControl(process.stdin, {
		severity: simulator.severity,
		onCycle: (offset) => {
			simulator.cycleEffect(offset).catch((error: unknown) => {
				console.error('[main] Effect switch failed:', error instanceof Error ? error.message : String(error));
			});
		},
		onQuit: quit
	});

	process.once('SIGINT', quit);
	process.once('SIGTERM', quit);

	if (config.keyboard && process.stdin.isTTY) {
		keyboard.attach();
	}

	try {
		await simulator.start(config.effect);
		await finished;
	} finally {
		keyboard.detach();
		restoreConsole();
	}

	const outcome = simulator.lastOutcome;
	if (outcome) {
		const d = outcome.diagnostics;
		console.log(
			`[main] ${outcome.reason}: captured=${d.capturedFrames} presented=${d.presentedFrames} ` +
				`dropRate=${d.dropRate.toFixed(3)} avgLatency=${d.averageWorkerLatencyMs.toFixed(1)}ms`
		);
	}

	if (simulator.lastError || outcome?.reason === 'source-failure') {
		console.error('[main]', outcome?.error?.message ?? simulator.lastError?.message);
		return 1;
	}
	return 0;
}

main(process.argv.slice(2)).then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		console.error('[main] Fatal:', error instanceof Error ? error.message : String(error));
		process.exitCode = 1;
	}
);
