/**
 * Vitest Global Setup
 *
 * Lifecycle logging is muted for every test; tests that assert on
 * warnings or errors install their own spies.
 */

// Import fast-check vitest integration for it.prop()
import '@fast-check/vitest';

import { afterEach, beforeEach, vi } from 'vitest';

beforeEach(() => {
	vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
	vi.restoreAllMocks();
});
