import type { MediaBackendKind } from '../value-objects/capabilities.js';
import type { MediaOptions, Resolution } from '../value-objects/media-options.js';
import type { SlateSpec } from '../value-objects/slate-spec.js';

export interface MediaRequestProps {
  readonly id: string;
  readonly backend: MediaBackendKind;
  readonly inputPath: string;
  readonly outputPath: string;
  readonly resolution: Resolution;
  readonly extension: string;
  readonly frameRate?: number;
  readonly options: MediaOptions;
  readonly slate?: SlateSpec;
  readonly templatePath?: string;
}

export class MediaRequest {
  public readonly id: string;

  public readonly backend: MediaBackendKind;

  public readonly inputPath: string;

  public readonly outputPath: string;

  public readonly resolution: Resolution;

  public readonly extension: string;

  public readonly frameRate?: number;

  public readonly options: MediaOptions;

  public readonly slate?: SlateSpec;

  public readonly templatePath?: string;

  private constructor(props: MediaRequestProps) {
    this.id = props.id;
    this.backend = props.backend;
    this.inputPath = props.inputPath;
    this.outputPath = props.outputPath;
    this.resolution = Object.freeze({ ...props.resolution });
    this.extension = props.extension.replace(/^\./, '').toLowerCase();
    this.frameRate = props.frameRate;
    this.options = Object.freeze({ ...props.options });
    this.slate = props.slate ? Object.freeze({ ...props.slate }) : undefined;
    this.templatePath = props.templatePath;
    Object.freeze(this);
  }

  public static create(props: MediaRequestProps): MediaRequest {
    if (props.id.trim() === '') {
      throw new Error('Media request must carry an id');
    }

    if (props.inputPath.trim() === '' || props.outputPath.trim() === '') {
      throw new Error('Media request must define input and output paths');
    }

    const { width, height } = props.resolution;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new Error('Media request resolution must be positive integers');
    }

    if (props.frameRate !== undefined && props.frameRate <= 0) {
      throw new Error('Frame rate must be positive');
    }

    return new MediaRequest(props);
  }
}
