import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, test } from 'vitest';

import { CreateMediaCommand } from '../../../src/application/media/index.js';
import type { CommandInvocation, CommandRunner } from '../../../src/domain/media/index.js';
import { buildMediaPipeline, buildTrackingPipeline } from '../../../src/infrastructure/daily-pipeline.js';
import { dailyDirectoryName } from '../../../src/infrastructure/media/scratch-directory.js';
import { loadConfig } from '../../../src/shared/config/env.js';

/** Stands in for ffmpeg: records the call and creates the file it was asked to write. */
function touchingRunner() {
  const calls: CommandInvocation[] = [];
  const runner: CommandRunner = {
    run: async (invocation) => {
      calls.push(invocation);
      const target = invocation.args.at(-1);
      if (target !== undefined) {
        await writeFile(target, '');
      }
      return { exitCode: 0, stdout: '', stderr: '' };
    },
  };
  return { runner, calls };
}

describe('daily pipeline', () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  test('slates and muxes an image sequence through ffmpeg', async () => {
    const base = await mkdtemp(path.join(os.tmpdir(), 'daily-'));
    tempDirs.push(base);
    await mkdir(path.join(base, 'plates'));
    await mkdir(path.join(base, 'out'));
    await writeFile(path.join(base, 'plates', 'sh010.0001.jpg'), '');
    const { runner, calls } = touchingRunner();

    const pipeline = buildMediaPipeline(loadConfig({ DAILIES_TMP_DIR: base }), runner);
    const outcome = await pipeline.handler.execute(
      new CreateMediaCommand({
        id: 'req-1',
        backend: 'ffmpeg',
        inputPath: path.join(base, 'plates', 'sh010.%04d.jpg'),
        outputPath: path.join(base, 'out', 'sh010.mov'),
        frameRate: 24,
        slate: { version: 'v001', artist: 'Ada' },
      }),
    );

    const scratchDir = path.join(base, dailyDirectoryName(new Date()));
    const slatePath = path.join(scratchDir, 'slate-req-1.jpg');
    const manifestPath = path.join(scratchDir, 'concat-req-1.txt');

    expect(outcome).toEqual({
      requestId: 'req-1',
      outputPath: path.join(base, 'out', 'sh010.mov'),
      artifacts: [manifestPath],
    });
    expect(calls.map((call) => call.args.slice(0, 2))).toEqual([
      ['-f', 'lavfi'],
      ['-loglevel', 'info'],
    ]);
    expect(calls[0]?.args.at(-1)).toBe(slatePath);
    expect(await readFile(manifestPath, 'utf8')).toBe(
      `file '${slatePath}'\nfile '${path.join(base, 'plates', 'sh010.%04d.jpg')}'\n`,
    );
  });

  test('tracking needs connection settings', () => {
    expect(() => buildTrackingPipeline(loadConfig({}), 'shotgun', {})).toThrow(
      'shotgun tracking is missing configuration: TRACKING_URL, TRACKING_LOGIN, TRACKING_PASSWORD',
    );
  });
});
