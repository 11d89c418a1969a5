export const MEDIA_BACKEND_KINDS = ['ffmpeg', 'nuke', 'nuke-template'] as const;

export type MediaBackendKind = (typeof MEDIA_BACKEND_KINDS)[number];

export interface BackendCapability {
  readonly extensions: readonly string[];
  /** Backend can prepend a rendered slate frame. */
  readonly slate: boolean;
  /** Backend evaluates over an explicit first/last frame span. */
  readonly frameRange: boolean;
}

export interface EncodingProfile {
  readonly codec: string;
  readonly pixelFormat: string;
}

/** Knobs a graph Write node accepts for one output format. */
export interface WriteFormatSpec {
  readonly fileType: string;
  readonly frameRateKnob?: string;
  readonly knobs: readonly string[];
}

export interface WriteNodeTables {
  /** Knobs every Write node carries regardless of format. */
  readonly common: readonly string[];
  readonly formats: Readonly<Record<string, WriteFormatSpec>>;
}

export interface CapabilityTables {
  readonly backends: Readonly<Record<MediaBackendKind, BackendCapability>>;
  readonly codecs: Readonly<Partial<Record<MediaBackendKind, Readonly<Record<string, EncodingProfile>>>>>;
  readonly sequenceExtensions: readonly string[];
  readonly videoExtensions: readonly string[];
  readonly writeNodes: WriteNodeTables;
}

export function isMediaBackendKind(value: string): value is MediaBackendKind {
  return MEDIA_BACKEND_KINDS.some((kind) => kind === value);
}
