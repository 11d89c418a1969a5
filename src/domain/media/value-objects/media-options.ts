/**
 * Free-form backend options. A `null` value marks a switch that is emitted
 * without an argument (`-y`, `-shortest`).
 */
export type OptionValue = string | number | null;

export type MediaOptions = Readonly<Record<string, OptionValue>>;

export interface Resolution {
  readonly width: number;
  readonly height: number;
}

export function formatResolution(resolution: Resolution): string {
  return `${resolution.width}x${resolution.height}`;
}

export function sameResolution(a: Resolution, b: Resolution): boolean {
  return a.width === b.width && a.height === b.height;
}
