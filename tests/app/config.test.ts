/**
 * Command-line configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, parseAppConfig } from '$lib/app/config';

function issuesOf(argv: string[]): string[] {
	try {
		parseAppConfig(argv);
	} catch (error: unknown) {
		if (error instanceof ConfigError) return error.issues;
		throw error;
	}
	throw new Error('expected a ConfigError');
}

describe('parseAppConfig', () => {
	it('should fill in defaults', () => {
		expect(parseAppConfig([])).toEqual({
			effect: 'glaucoma',
			severity: 0.5,
			source: 'synthetic',
			device: 0,
			file: null,
			width: 96,
			height: 54,
			frameRate: 30,
			frames: null,
			pipeline: { displayFps: 30, workerCount: 1, inboundCapacity: 2 },
			keyboard: true,
			help: false
		});
	});

	it('should read every flag', () => {
		const config = parseAppConfig([
			'--effect',
			'cataract',
			'-s',
			'0.8',
			'--source',
			'file',
			'-f',
			'clip.mp4',
			'--width',
			'120',
			'--height',
			'68',
			'--frame-rate',
			'25',
			'--frames',
			'100',
			'--fps',
			'60',
			'-w',
			'4',
			'--queue',
			'3',
			'--no-keys'
		]);

		expect(config).toEqual({
			effect: 'cataract',
			severity: 0.8,
			source: 'file',
			device: 0,
			file: 'clip.mp4',
			width: 120,
			height: 68,
			frameRate: 25,
			frames: 100,
			pipeline: { displayFps: 60, workerCount: 4, inboundCapacity: 3 },
			keyboard: false,
			help: false
		});
	});

	it('should accept --help and -h', () => {
		expect(parseAppConfig(['--help']).help).toBe(true);
		expect(parseAppConfig(['-h']).help).toBe(true);
	});

	it('should reject a severity outside [0, 1]', () => {
		expect(issuesOf(['--severity', '1.5'])).toEqual(['--severity: Number must be less than or equal to 1']);
	});

	it('should require a file for the file source', () => {
		expect(issuesOf(['--source', 'file'])).toEqual(['--file: required when --source is file']);
	});

	it('should list every invalid flag in one error', () => {
		expect(() => parseAppConfig(['--severity', '2', '--fps', '0'])).toThrow(
			'Invalid options:\n' +
				'  --severity: Number must be less than or equal to 1\n' +
				'  --fps: Number must be greater than or equal to 1'
		);
	});

	it('should reject too many workers and non-integer counts', () => {
		expect(issuesOf(['--workers', '17'])).toEqual(['--workers: Number must be less than or equal to 16']);
		expect(issuesOf(['--queue', '1.5'])).toEqual(['--queue: Expected integer, received float']);
	});

	it('should reject an unknown source kind', () => {
		const [issue] = issuesOf(['--source', 'webcam']);

		expect(issue).toMatch(/^--source: /);
	});

	it('should report unknown flags and stray arguments', () => {
		expect(issuesOf(['--bogus'])[0]).toContain("'--bogus'");
		expect(issuesOf(['extra'])).toHaveLength(1);
	});
});
