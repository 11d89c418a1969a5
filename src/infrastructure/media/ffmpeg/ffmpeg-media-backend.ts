import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import {
  formatResolution,
  type BackendCapability,
  type CommandInvocation,
  type CommandRunner,
  type EncodingProfile,
  type MediaBackend,
  type MediaOptions,
  type MediaRequest,
  type SynthesisPlan,
  type SynthesisResult,
} from '../../../domain/media/index.js';
import { createChildLogger, type Logger } from '../../../shared/logger/pino.js';
import { toPrintfPattern } from '../../../shared/media/framePattern.js';

export function quoteConcatPath(filePath: string): string {
  return `'${filePath.replace(/'/g, "'\\''")}'`;
}

/**
 * Concat demuxer manifest: the slate (when present) always comes first.
 * Entries are absolute since the demuxer resolves relative ones against the
 * manifest's own directory, and frame placeholders are in printf form.
 */
export function buildConcatManifest(inputPath: string, slateAsset: string | null): string {
  const entries = slateAsset ? [slateAsset, inputPath] : [inputPath];
  return entries.map((entry) => `file ${quoteConcatPath(toPrintfPattern(path.resolve(entry)))}\n`).join('');
}

export function optionArguments(options: MediaOptions): string[] {
  return Object.entries(options).flatMap(([flag, value]) =>
    value === null ? [`-${flag}`] : [`-${flag}`, String(value)],
  );
}

export function buildFfmpegInvocation(
  binary: string,
  request: MediaRequest,
  manifestPath: string,
  encoding: EncodingProfile | null,
): CommandInvocation {
  const args = [
    '-loglevel',
    'info',
    '-f',
    'concat',
    '-safe',
    '0',
    '-i',
    manifestPath,
    '-s',
    formatResolution(request.resolution),
    '-threads',
    '4',
  ];

  if (encoding) {
    args.push('-c:v', encoding.codec, '-pix_fmt', encoding.pixelFormat);
  }

  if (request.frameRate !== undefined) {
    args.push('-r', String(request.frameRate));
  }

  args.push(...optionArguments(request.options), toPrintfPattern(request.outputPath));

  return { command: binary, args };
}

export interface FfmpegMediaBackendOptions {
  readonly ffmpegPath?: string;
  readonly logger?: Logger;
}

/**
 * Stream-mux backend: every input goes through the concat demuxer so a slate
 * frame can be spliced in front of the source.
 */
export class FfmpegMediaBackend implements MediaBackend {
  public readonly kind = 'ffmpeg';

  private readonly ffmpegPath: string;

  private readonly logger: Logger;

  public constructor(
    public readonly capability: BackendCapability,
    private readonly runner: CommandRunner,
    options: FfmpegMediaBackendOptions = {},
  ) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.logger = options.logger ?? createChildLogger({ module: 'FfmpegMediaBackend' });
  }

  public async synthesize(plan: SynthesisPlan): Promise<SynthesisResult> {
    const { request, scratch } = plan;
    const manifestPath = scratch.file('concat', 'txt');

    await writeFile(manifestPath, buildConcatManifest(request.inputPath, plan.slateAsset), 'utf8');
    this.logger.debug({ manifestPath, slate: plan.slateAsset !== null }, 'Concat manifest written');

    const invocation = buildFfmpegInvocation(this.ffmpegPath, request, manifestPath, plan.encoding);
    await this.runner.run(invocation);

    return { outputPath: request.outputPath, artifacts: [manifestPath], invocation };
  }
}
