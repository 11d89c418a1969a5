import { describe, expect, test, vi } from 'vitest';

import { loadCapabilityTables } from '../../../../src/infrastructure/media/capability-loader.js';
import { createMediaBackendRegistry } from '../../../../src/infrastructure/media/media-backend-registry.js';

import { recordingRunner } from './fakes.js';

describe('MediaBackendRegistry', () => {
  const registry = createMediaBackendRegistry({
    capabilities: loadCapabilityTables(),
    runner: recordingRunner().runner,
    prober: { probe: vi.fn() },
    binaries: { ffmpeg: 'ffmpeg', nuke: 'nuke' },
  });

  test('resolves every known backend case-insensitively', () => {
    expect(registry.resolve('FFmpeg').kind).toBe('ffmpeg');
    expect(registry.resolve('nuke').kind).toBe('nuke');
    expect(registry.resolve('Nuke-Template').kind).toBe('nuke-template');
    expect(registry.resolve('nuke').capability.frameRange).toBe(true);
  });

  test('rejects unknown backends', () => {
    expect(() => registry.resolve('resolve')).toThrow('Unsupported media backend: resolve');
  });
});
