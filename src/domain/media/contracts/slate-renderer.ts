import type { Resolution } from '../value-objects/media-options.js';
import type { SlateSpec } from '../value-objects/slate-spec.js';
import type { ScratchSpace } from './media-backend.js';

export interface SlateRenderer {
  /** Renders a single slate frame with the given extension and returns its path. */
  render(slate: SlateSpec, canvas: Resolution, format: string, scratch: ScratchSpace): Promise<string>;
}
