import os from 'node:os';

import { describe, expect, test } from 'vitest';

import { loadConfig } from '../../../../src/shared/config/env.js';

describe('loadConfig', () => {
  test('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.logLevel).toBe('info');
    expect(config.scratch.baseDirectory).toBe(os.tmpdir());
    expect(config.sequence).toEqual({ startFrame: 1, scanLimit: 999 });
    expect(config.binaries).toEqual({ ffmpeg: 'ffmpeg', ffprobe: 'ffprobe', nuke: 'nuke' });
    expect(config.slate).toEqual({ fontFile: undefined, fontSize: 18, spacing: 8 });
    expect(config.tracking.backend).toBe('shotgun');
    expect(config.capabilitiesPath).toBeUndefined();
  });

  test('coerces numeric variables', () => {
    const config = loadConfig({
      DAILIES_FRAME_START: '1001',
      DAILIES_FRAME_SCAN_LIMIT: '2000',
      DAILIES_SLATE_FONT_SIZE: '24',
      TRACKING_BACKEND: 'kitsu',
      TRACKING_URL: 'https://tracking.test',
    });

    expect(config.sequence).toEqual({ startFrame: 1001, scanLimit: 2000 });
    expect(config.slate.fontSize).toBe(24);
    expect(config.tracking).toEqual({
      backend: 'kitsu',
      url: 'https://tracking.test',
      login: undefined,
      password: undefined,
    });
  });

  test('names every invalid key', () => {
    expect(() => loadConfig({ DAILIES_FRAME_SCAN_LIMIT: 'lots', LOG_LEVEL: 'loud' })).toThrowError(
      'Missing or invalid environment variables: LOG_LEVEL, DAILIES_FRAME_SCAN_LIMIT',
    );
  });
});
