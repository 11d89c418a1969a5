import type { MediaRequest } from '../entities/media-request.js';
import type { BackendCapability, EncodingProfile, MediaBackendKind } from '../value-objects/capabilities.js';
import type { FrameRange } from '../value-objects/frame-range.js';
import type { CommandInvocation } from './command-runner.js';

/**
 * Request-scoped view of the shared per-day scratch directory. Every file it
 * hands out carries the request token so concurrent requests never collide.
 */
export interface ScratchSpace {
  readonly directory: string;
  readonly token: string;
  file(stem: string, extension: string): string;
}

export interface SynthesisPlan {
  readonly request: MediaRequest;
  readonly frameRange: FrameRange | null;
  readonly slateAsset: string | null;
  readonly encoding: EncodingProfile | null;
  readonly scratch: ScratchSpace;
}

export interface SynthesisResult {
  readonly outputPath: string;
  /** Scratch files written while building the plan (manifests, scripts). */
  readonly artifacts: readonly string[];
  readonly invocation: CommandInvocation;
}

export interface MediaBackend {
  readonly kind: MediaBackendKind;
  readonly capability: BackendCapability;
  synthesize(plan: SynthesisPlan): Promise<SynthesisResult>;
}

export interface MediaBackendResolver {
  resolve(name: string): MediaBackend;
}

export interface ScratchProvider {
  /** Opens the scratch space for one request; `token` suffixes every file in it. */
  open(token: string): Promise<ScratchSpace>;
}
