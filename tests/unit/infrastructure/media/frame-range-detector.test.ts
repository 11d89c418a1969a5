import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, test } from 'vitest';

import { MEDIA_ERROR_CODES } from '../../../../src/domain/media/index.js';
import { FrameRangeDetector } from '../../../../src/infrastructure/media/frame-range-detector.js';

function detectorFor(frames: readonly number[], scanLimit?: number): FrameRangeDetector {
  const present = new Set(frames.map((frame) => `/plates/sh010.${frame.toString().padStart(3, '0')}.jpg`));
  return new FrameRangeDetector({ scanLimit, exists: async (filePath) => present.has(filePath) });
}

const PATTERN = '/plates/sh010.%03d.jpg';

describe('FrameRangeDetector', () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  test('contiguous frames 1..N give (1, N)', async () => {
    const range = await detectorFor([1, 2, 3, 4, 5]).detect(PATTERN);
    expect([range.first, range.last]).toEqual([1, 5]);
  });

  test('stops at the first gap', async () => {
    const range = await detectorFor([1, 2, 4, 5, 6, 7, 8, 9, 10]).detect(PATTERN);
    expect([range.first, range.last]).toEqual([1, 2]);
  });

  test('a run may start after frame 1', async () => {
    const range = await detectorFor([4, 5, 6]).detect(PATTERN);
    expect([range.first, range.last]).toEqual([4, 6]);
  });

  test('a run reaching the scan limit ends at the limit', async () => {
    const range = await detectorFor([1, 2, 3, 4, 5, 6, 7], 5).detect(PATTERN);
    expect([range.first, range.last]).toEqual([1, 5]);
  });

  test('no frames at all is SequenceNotFound', async () => {
    await expect(detectorFor([]).detect(PATTERN)).rejects.toMatchObject({
      code: MEDIA_ERROR_CODES.sequenceNotFound,
      metadata: { pattern: PATTERN, scanned: { from: 1, to: 999 } },
    });
  });

  test('a path without placeholder is SequenceNotFound', async () => {
    await expect(detectorFor([1]).detect('/plates/sh010.jpg')).rejects.toMatchObject({
      code: MEDIA_ERROR_CODES.sequenceNotFound,
    });
  });

  test('scans the real filesystem with hash padding', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'frames-'));
    tempDirs.push(dir);
    await Promise.all([1, 2, 3].map((frame) => writeFile(path.join(dir, `plate.000${frame}.png`), '')));

    const range = await new FrameRangeDetector({ scanLimit: 20 }).detect(path.join(dir, 'plate.####.png'));
    expect([range.first, range.last]).toEqual([1, 3]);
  });
});
