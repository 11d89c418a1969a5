export interface MediaProbe {
  readonly width: number;
  readonly height: number;
  /** Null when the container does not report a frame count. */
  readonly frameCount: number | null;
}

export interface MediaProber {
  probe(filePath: string): Promise<MediaProbe>;
}
