import { access } from 'node:fs/promises';

import {
  formatInvocation,
  FrameRange,
  MediaErrors,
  type BackendCapability,
  type CapabilityTables,
  type EncodingProfile,
  type FrameRangeSource,
  type MediaBackend,
  type MediaBackendResolver,
  type MediaProber,
  type MediaRequest,
  type ScratchProvider,
  type ScratchSpace,
  type SlateRenderer,
  type SynthesisResult,
} from '../../domain/media/index.js';
import { createChildLogger, type Logger } from '../../shared/logger/pino.js';
import {
  extensionOf,
  formatFrame,
  hasFramePlaceholder,
  parseFramePattern,
} from '../../shared/media/framePattern.js';

export interface MediaSynthesizerDependencies {
  readonly capabilities: CapabilityTables;
  readonly backends: MediaBackendResolver;
  readonly frameRanges: FrameRangeSource;
  readonly slates: SlateRenderer;
  readonly prober: MediaProber;
  readonly scratch: ScratchProvider;
}

export interface MediaSynthesizerOptions {
  /** Frame number substituted into a sequence pattern when checking the input exists. */
  readonly startFrame?: number;
  readonly exists?: (filePath: string) => Promise<boolean>;
  readonly logger?: Logger;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** Path of a concrete file standing for a possibly frame-numbered path. */
export function representativeFrame(filePath: string, frame: number): string {
  const pattern = parseFramePattern(filePath);
  return pattern ? formatFrame(pattern, frame) : filePath;
}

/**
 * Codec/pixel format for the target extension. Extracting frames from a video
 * container needs no encoder settings; a backend with a codec table must
 * have an entry for the extension.
 */
export function negotiateEncoding(
  capabilities: CapabilityTables,
  request: MediaRequest,
): EncodingProfile | null {
  const inputIsVideo = capabilities.videoExtensions.includes(extensionOf(request.inputPath));
  const targetIsSequence = capabilities.sequenceExtensions.includes(request.extension);
  if (inputIsVideo && targetIsSequence) {
    return null;
  }

  const table = capabilities.codecs[request.backend];
  if (!table) {
    return null;
  }

  const profile = table[request.extension];
  if (!profile) {
    throw MediaErrors.unsupportedOption(request.backend, request.extension);
  }
  return profile;
}

/**
 * Turns a validated request into an artifact: checks the input, optionally
 * renders a slate, negotiates encoding and a frame range, then delegates to
 * the selected backend.
 */
export class MediaSynthesizer {
  private readonly startFrame: number;

  private readonly exists: (filePath: string) => Promise<boolean>;

  private readonly logger: Logger;

  public constructor(
    private readonly deps: MediaSynthesizerDependencies,
    options: MediaSynthesizerOptions = {},
  ) {
    this.startFrame = options.startFrame ?? 1;
    this.exists = options.exists ?? fileExists;
    this.logger = options.logger ?? createChildLogger({ module: 'MediaSynthesizer' });
  }

  public async create(request: MediaRequest): Promise<string> {
    const result = await this.synthesize(request);
    return result.outputPath;
  }

  public async synthesize(request: MediaRequest): Promise<SynthesisResult> {
    await this.ensureInputExists(request);

    const backend = this.deps.backends.resolve(request.backend);
    const capability = this.deps.capabilities.backends[backend.kind];
    if (!capability.extensions.includes(request.extension)) {
      throw MediaErrors.unsupportedExtension(backend.kind, request.extension, capability.extensions);
    }

    const encoding = negotiateEncoding(this.deps.capabilities, request);
    const scratch = await this.deps.scratch.open(request.id);
    const slateAsset = await this.prepareSlate(request, capability, scratch);
    const frameRange = capability.frameRange ? await this.establishFrameRange(request) : null;

    this.logger.info(
      {
        requestId: request.id,
        backend: backend.kind,
        extension: request.extension,
        codec: encoding?.codec ?? null,
        frameRange: frameRange?.toString() ?? null,
        slate: slateAsset !== null,
      },
      'Synthesizing media',
    );

    const result = await backend.synthesize({ request, frameRange, slateAsset, encoding, scratch });
    await this.ensureOutputExists(backend, result, frameRange);

    this.logger.info({ requestId: request.id, outputPath: result.outputPath }, 'Media created');
    return result;
  }

  private async ensureInputExists(request: MediaRequest): Promise<void> {
    const checkedPath = representativeFrame(request.inputPath, this.startFrame);
    if (!(await this.exists(checkedPath))) {
      throw MediaErrors.inputNotFound(request.inputPath, checkedPath);
    }
  }

  private async prepareSlate(
    request: MediaRequest,
    capability: BackendCapability,
    scratch: ScratchSpace,
  ): Promise<string | null> {
    if (!request.slate) {
      return null;
    }

    if (!capability.slate) {
      this.logger.warn({ requestId: request.id, backend: request.backend }, 'Backend cannot add a slate, skipping it');
      return null;
    }

    return this.deps.slates.render(request.slate, request.resolution, extensionOf(request.inputPath), scratch);
  }

  private async establishFrameRange(request: MediaRequest): Promise<FrameRange> {
    if (hasFramePlaceholder(request.inputPath)) {
      return this.deps.frameRanges.detect(request.inputPath);
    }

    const probe = await this.deps.prober.probe(request.inputPath);
    if (probe.frameCount === null) {
      throw MediaErrors.frameRangeRequired(request.backend, request.inputPath);
    }
    return FrameRange.create(1, probe.frameCount);
  }

  private async ensureOutputExists(
    backend: MediaBackend,
    result: SynthesisResult,
    frameRange: FrameRange | null,
  ): Promise<void> {
    const checkedPath = representativeFrame(result.outputPath, frameRange?.first ?? 1);
    if (await this.exists(checkedPath)) {
      return;
    }

    throw MediaErrors.executionFailed(`${backend.kind} finished without writing ${checkedPath}`, {
      outputPath: result.outputPath,
      checkedPath,
      command: formatInvocation(result.invocation),
    });
  }
}
