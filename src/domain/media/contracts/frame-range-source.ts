import type { FrameRange } from '../value-objects/frame-range.js';

export interface FrameRangeSource {
  detect(pathPattern: string): Promise<FrameRange>;
}
