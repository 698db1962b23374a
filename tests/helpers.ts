/**
 * Shared test fixtures.
 */

import type { Settings } from '../src/config/settings.js';

export function testSettings(workspaceRoot: string, overrides: Partial<Settings> = {}): Settings {
  return {
    workspaceRoot,
    provider: { name: 'lm_studio', baseUrl: 'http://localhost:1234/v1', model: 'test-model' },
    maxIterations: 10,
    permission: 'strict',
    bashTimeoutSec: 30,
    logLevel: 'silent',
    ...overrides,
  };
}
