import {
  formatResolution,
  MediaErrors,
  type CommandInvocation,
  type CommandRunner,
  type Resolution,
  type ScratchSpace,
  type SlateField,
  type SlateRenderer,
  type SlateSpec,
} from '../../domain/media/index.js';
import { createChildLogger, type Logger } from '../../shared/logger/pino.js';

const SLATE_TEMPLATE: ReadonlyArray<readonly [label: string, field: SlateField]> = [
  ['VERSION', 'version'],
  ['FILE', 'file'],
  ['DESCRIPTION', 'description'],
  ['ARTIST', 'artist'],
  ['LINK', 'link'],
  ['TASK', 'task'],
  ['PROJECT', 'project'],
  ['RESOLUTION', 'resolution'],
  ['FPS', 'fps'],
];

const DRAWTEXT_UNSAFE = /[:'\\%]/g;

export interface SlateTypography {
  readonly fontSize: number;
  readonly spacing: number;
  /** Added to the vertically centred start position. */
  readonly offset: number;
}

export const DEFAULT_TYPOGRAPHY: SlateTypography = { fontSize: 18, spacing: 8, offset: 10 };

export interface SlateLine {
  readonly text: string;
  readonly y: number;
}

export interface SlateLayout {
  readonly lines: readonly SlateLine[];
  readonly lineHeight: number;
  readonly totalHeight: number;
  readonly startY: number;
}

export function formatSlateText(slate: SlateSpec): string {
  return SLATE_TEMPLATE.map(([label, field]) => `${label}: ${slate[field] ?? ''}`).join('\n');
}

export function sanitizeSlateLine(line: string): string {
  return line.replace(DRAWTEXT_UNSAFE, '');
}

function trimBlankLines(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && (lines[start] ?? '').trim() === '') start += 1;
  while (end > start && (lines[end - 1] ?? '').trim() === '') end -= 1;
  return lines.slice(start, end);
}

/** Vertically centres the slate text block on a canvas of the given height. */
export function layoutSlate(
  slate: SlateSpec,
  canvasHeight: number,
  typography: SlateTypography = DEFAULT_TYPOGRAPHY,
): SlateLayout {
  const texts = trimBlankLines(formatSlateText(slate).split(/\r?\n/)).map(sanitizeSlateLine);
  const lineHeight = typography.fontSize + typography.spacing;
  const totalHeight = texts.length > 0 ? texts.length * lineHeight - typography.spacing : 0;
  const startY = Math.floor((canvasHeight - totalHeight) / 2) + typography.offset;

  return {
    lines: texts.map((text, index) => ({ text, y: startY + index * lineHeight })),
    lineHeight,
    totalHeight,
    startY,
  };
}

export interface SlateCompositorOptions {
  readonly ffmpegPath?: string;
  readonly fontFile?: string;
  readonly typography?: Partial<SlateTypography>;
  /** Container formats; every other format is written as a single still image. */
  readonly videoExtensions?: readonly string[];
  readonly logger?: Logger;
}

/**
 * Renders slates as one black frame with a drawtext filter per line.
 */
export class SlateCompositor implements SlateRenderer {
  private readonly ffmpegPath: string;

  private readonly fontFile?: string;

  private readonly typography: SlateTypography;

  private readonly videoExtensions: ReadonlySet<string>;

  private readonly logger: Logger;

  public constructor(
    private readonly runner: CommandRunner,
    options: SlateCompositorOptions = {},
  ) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.fontFile = options.fontFile;
    this.typography = { ...DEFAULT_TYPOGRAPHY, ...options.typography };
    this.videoExtensions = new Set(options.videoExtensions ?? []);
    this.logger = options.logger ?? createChildLogger({ module: 'SlateCompositor' });
  }

  public layout(slate: SlateSpec, canvas: Resolution): SlateLayout {
    return layoutSlate(slate, canvas.height, this.typography);
  }

  public buildInvocation(slate: SlateSpec, canvas: Resolution, outputPath: string, format: string): CommandInvocation {
    const filters = this.layout(slate, canvas)
      .lines.filter((line) => line.text !== '')
      .map((line) => this.drawtext(line));

    const args = ['-f', 'lavfi', '-t', '0.001', '-i', `color=c=black:s=${formatResolution(canvas)}`];
    if (filters.length > 0) {
      args.push('-vf', filters.join(','));
    }
    args.push('-frames:v', '1');
    if (!this.videoExtensions.has(format)) {
      args.push('-update', '1');
    }
    args.push('-y', outputPath);

    return { command: this.ffmpegPath, args };
  }

  public async render(slate: SlateSpec, canvas: Resolution, format: string, scratch: ScratchSpace): Promise<string> {
    const outputPath = scratch.file('slate', format);

    try {
      const invocation = this.buildInvocation(slate, canvas, outputPath, format);
      await this.runner.run(invocation);
    } catch (error) {
      this.logger.error({ outputPath, error }, 'Slate render failed');
      throw MediaErrors.slateRenderFailed(outputPath, error);
    }

    this.logger.info({ outputPath }, 'Slate frame rendered');
    return outputPath;
  }

  private drawtext(line: SlateLine): string {
    const font = this.fontFile ? `:fontfile='${this.fontFile}'` : '';
    return `drawtext=fontsize=${this.typography.fontSize}:fontcolor=white${font}:text='${line.text}':x=(w-text_w)/2:y=${line.y}`;
  }
}
