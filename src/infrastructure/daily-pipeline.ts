import { CreateMediaHandler, MediaSynthesizer } from '../application/media/index.js';
import { IdentityResolver, PublishVersionHandler, VersionPublisher } from '../application/tracking/index.js';
import type { CommandRunner } from '../domain/media/index.js';
import type { IdentitySeed } from '../domain/tracking/index.js';
import type { PipelineConfig } from '../shared/config/env.js';

import { defaultCapabilitiesPath, loadCapabilityTables } from './media/capability-loader.js';
import { FfprobeMediaProber } from './media/ffprobe-media-prober.js';
import { FrameRangeDetector } from './media/frame-range-detector.js';
import { createMediaBackendRegistry } from './media/media-backend-registry.js';
import { ScratchDirectory } from './media/scratch-directory.js';
import { SlateCompositor } from './media/slate-compositor.js';
import { SpawnCommandRunner } from './process/spawn-command-runner.js';
import type { FetchLike } from './tracking/http/json-http-client.js';
import { createTrackingBackend } from './tracking/tracking-backend-registry.js';

export interface MediaPipeline {
  readonly handler: CreateMediaHandler;
  readonly synthesizer: MediaSynthesizer;
}

export function buildMediaPipeline(config: PipelineConfig, runner: CommandRunner = new SpawnCommandRunner()): MediaPipeline {
  const capabilities = loadCapabilityTables(config.capabilitiesPath ?? defaultCapabilitiesPath());
  const prober = new FfprobeMediaProber(runner, config.binaries.ffprobe);

  const synthesizer = new MediaSynthesizer(
    {
      capabilities,
      backends: createMediaBackendRegistry({
        capabilities,
        runner,
        prober,
        binaries: { ffmpeg: config.binaries.ffmpeg, nuke: config.binaries.nuke },
      }),
      frameRanges: new FrameRangeDetector({ scanLimit: config.sequence.scanLimit }),
      slates: new SlateCompositor(runner, {
        ffmpegPath: config.binaries.ffmpeg,
        fontFile: config.slate.fontFile,
        typography: { fontSize: config.slate.fontSize, spacing: config.slate.spacing },
        videoExtensions: capabilities.videoExtensions,
      }),
      prober,
      scratch: new ScratchDirectory(config.scratch.baseDirectory),
    },
    { startFrame: config.sequence.startFrame },
  );

  return { handler: new CreateMediaHandler(synthesizer), synthesizer };
}

export interface TrackingPipeline {
  readonly handler: PublishVersionHandler;
  readonly identities: IdentityResolver;
}

export function buildTrackingPipeline(
  config: PipelineConfig,
  backendName: string,
  seed: IdentitySeed,
  fetchImpl?: FetchLike,
): TrackingPipeline {
  const backend = createTrackingBackend(backendName, { ...config.tracking, fetch: fetchImpl });
  const identities = new IdentityResolver(backend, seed);
  return { handler: new PublishVersionHandler(new VersionPublisher(backend, identities)), identities };
}
