import path from 'node:path';

/**
 * A frame-numbered file pattern split around its placeholder, e.g.
 * `plate.%04d.exr` → `{ prefix: 'plate.', padding: 4, suffix: '.exr' }`.
 * Both printf (`%04d`, `%d`) and hash (`####`) placeholders are understood.
 */
export interface FramePattern {
  readonly prefix: string;
  readonly padding: number;
  readonly suffix: string;
  readonly placeholder: string;
}

const PLACEHOLDER = /%(?:0?(\d+))?d|#+/;

export function parseFramePattern(filePath: string): FramePattern | null {
  const match = PLACEHOLDER.exec(filePath);
  if (!match) {
    return null;
  }

  const [placeholder, width] = match;
  const padding = placeholder.startsWith('#')
    ? placeholder.length
    : width
      ? Number.parseInt(width, 10)
      : 1;

  return {
    prefix: filePath.slice(0, match.index),
    padding,
    suffix: filePath.slice(match.index + placeholder.length),
    placeholder,
  };
}

export function hasFramePlaceholder(filePath: string): boolean {
  return PLACEHOLDER.test(filePath);
}

export function formatFrame(pattern: FramePattern, frame: number): string {
  return `${pattern.prefix}${frame.toString().padStart(pattern.padding, '0')}${pattern.suffix}`;
}

/** Rewrites any placeholder into the zero-padded printf form, e.g. `###` → `%03d`. */
export function toPrintfPattern(filePath: string): string {
  const pattern = parseFramePattern(filePath);
  if (!pattern) {
    return filePath;
  }

  return `${pattern.prefix}%0${pattern.padding}d${pattern.suffix}`;
}

/** Lowercase extension without the dot; empty when the file has none. */
export function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}
