import { z } from 'zod';

import {
  MediaErrors,
  type CommandRunner,
  type MediaProbe,
  type MediaProber,
} from '../../domain/media/index.js';

const countField = z
  .union([z.string(), z.number()])
  .optional()
  .transform((value) => {
    const parsed = typeof value === 'number' ? value : Number.parseInt(value ?? '', 10);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : null;
  });

const probeOutputSchema = z.object({
  streams: z
    .array(
      z.object({
        width: z.number().int().positive(),
        height: z.number().int().positive(),
        nb_frames: countField,
        nb_read_frames: countField,
      }),
    )
    .min(1),
});

export function parseProbeOutput(stdout: string): MediaProbe | null {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    return null;
  }

  const parsed = probeOutputSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const [stream] = parsed.data.streams;
  if (!stream) {
    return null;
  }

  return {
    width: stream.width,
    height: stream.height,
    frameCount: stream.nb_frames ?? stream.nb_read_frames,
  };
}

export class FfprobeMediaProber implements MediaProber {
  public constructor(
    private readonly runner: CommandRunner,
    private readonly ffprobePath: string = 'ffprobe',
  ) {}

  public async probe(filePath: string): Promise<MediaProbe> {
    const invocation = {
      command: this.ffprobePath,
      args: [
        '-v',
        'error',
        '-select_streams',
        'v:0',
        '-count_frames',
        '-show_entries',
        'stream=width,height,nb_frames,nb_read_frames',
        '-of',
        'json',
        filePath,
      ],
    };

    const result = await this.runner.run(invocation);
    const probe = parseProbeOutput(result.stdout);
    if (!probe) {
      throw MediaErrors.executionFailed(`Unreadable probe output for ${filePath}`, {
        filePath,
        stdout: result.stdout,
      });
    }

    return probe;
  }
}
