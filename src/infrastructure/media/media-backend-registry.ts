import {
  isMediaBackendKind,
  MEDIA_BACKEND_KINDS,
  MediaErrors,
  type CapabilityTables,
  type CommandRunner,
  type MediaBackend,
  type MediaBackendResolver,
  type MediaBackendKind,
  type MediaProber,
} from '../../domain/media/index.js';

import { FfmpegMediaBackend } from './ffmpeg/ffmpeg-media-backend.js';
import { NukeMediaBackend } from './nuke/nuke-media-backend.js';
import { NukeTemplateMediaBackend } from './nuke/nuke-template-media-backend.js';

export class MediaBackendRegistry implements MediaBackendResolver {
  public constructor(private readonly backends: Readonly<Record<MediaBackendKind, MediaBackend>>) {}

  public get kinds(): readonly MediaBackendKind[] {
    return MEDIA_BACKEND_KINDS;
  }

  public resolve(name: string): MediaBackend {
    const key = name.toLowerCase();
    if (!isMediaBackendKind(key)) {
      throw MediaErrors.unknownBackend(name, MEDIA_BACKEND_KINDS);
    }
    return this.backends[key];
  }
}

export interface MediaBackendDependencies {
  readonly capabilities: CapabilityTables;
  readonly runner: CommandRunner;
  readonly prober: MediaProber;
  readonly binaries: { readonly ffmpeg: string; readonly nuke: string };
}

export function createMediaBackendRegistry(deps: MediaBackendDependencies): MediaBackendRegistry {
  const { backends, writeNodes } = deps.capabilities;

  return new MediaBackendRegistry({
    ffmpeg: new FfmpegMediaBackend(backends.ffmpeg, deps.runner, { ffmpegPath: deps.binaries.ffmpeg }),
    nuke: new NukeMediaBackend(backends.nuke, deps.runner, deps.prober, writeNodes, {
      nukePath: deps.binaries.nuke,
    }),
    'nuke-template': new NukeTemplateMediaBackend(backends['nuke-template'], deps.runner, {
      nukePath: deps.binaries.nuke,
    }),
  });
}
