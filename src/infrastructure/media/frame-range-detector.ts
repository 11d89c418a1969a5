import { access } from 'node:fs/promises';

import { FrameRange, MediaErrors, type FrameRangeSource } from '../../domain/media/index.js';
import { createChildLogger, type Logger } from '../../shared/logger/pino.js';
import { formatFrame, parseFramePattern } from '../../shared/media/framePattern.js';

export interface FrameRangeDetectorOptions {
  /** Highest frame number probed. */
  readonly scanLimit?: number;
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

/**
 * Finds the first contiguous run of frames on disk for a numbered pattern.
 * The scan starts at frame 1 and stops at the first gap after the run begins.
 */
export class FrameRangeDetector implements FrameRangeSource {
  private readonly scanLimit: number;

  private readonly exists: (filePath: string) => Promise<boolean>;

  private readonly logger: Logger;

  public constructor(options: FrameRangeDetectorOptions = {}) {
    this.scanLimit = options.scanLimit ?? 999;
    this.exists = options.exists ?? fileExists;
    this.logger = options.logger ?? createChildLogger({ module: 'FrameRangeDetector' });
  }

  public async detect(pathPattern: string): Promise<FrameRange> {
    const pattern = parseFramePattern(pathPattern);
    if (!pattern) {
      throw MediaErrors.sequenceNotFound(pathPattern, { from: 1, to: this.scanLimit });
    }

    let first: number | null = null;
    for (let frame = 1; frame <= this.scanLimit; frame += 1) {
      const present = await this.exists(formatFrame(pattern, frame));
      if (present && first === null) {
        first = frame;
      } else if (!present && first !== null) {
        const range = FrameRange.create(first, frame - 1);
        this.logger.debug({ pattern: pathPattern, range: range.toString() }, 'Detected frame range');
        return range;
      }
    }

    if (first === null) {
      throw MediaErrors.sequenceNotFound(pathPattern, { from: 1, to: this.scanLimit });
    }

    this.logger.warn({ pattern: pathPattern, scanLimit: this.scanLimit }, 'Frame scan reached its limit');
    return FrameRange.create(first, this.scanLimit);
  }
}
