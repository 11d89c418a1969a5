import type { MediaOptions, OptionValue, WriteFormatSpec, WriteNodeTables } from '../../../domain/media/index.js';
import { createChildLogger, type Logger } from '../../../shared/logger/pino.js';

import { setKnob, type NkNode } from './nk-document.js';

export interface ConfigureReport {
  readonly applied: readonly string[];
  readonly skipped: readonly string[];
}

/** Digit-only strings become integers; a bare flag becomes an enabled checkbox. */
export function coerceKnobValue(value: OptionValue): string | number | boolean {
  if (value === null) {
    return true;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return value;
}

/**
 * Points a Write node at one output format and maps user options onto the
 * knobs that format exposes.
 */
export class WriteNodeConfigurator {
  private readonly knownKnobs: ReadonlySet<string>;

  public constructor(
    private readonly format: WriteFormatSpec,
    commonKnobs: readonly string[],
    private readonly logger: Logger,
  ) {
    this.knownKnobs = new Set([...commonKnobs, ...format.knobs]);
  }

  public get fileType(): string {
    return this.format.fileType;
  }

  public configure(node: NkNode, options: MediaOptions, frameRate?: number): ConfigureReport {
    setKnob(node, 'file_type', this.format.fileType);
    if (frameRate !== undefined && this.format.frameRateKnob) {
      setKnob(node, this.format.frameRateKnob, frameRate);
    }

    const applied: string[] = [];
    const skipped: string[] = [];
    for (const [key, value] of Object.entries(options)) {
      if (!this.knownKnobs.has(key)) {
        this.logger.warn({ knob: key, fileType: this.format.fileType }, 'Unknown knob for write node, skipping');
        skipped.push(key);
        continue;
      }

      const coerced = coerceKnobValue(value);
      this.logger.debug({ knob: key, value: coerced }, 'Setting write knob');
      setKnob(node, key, coerced);
      applied.push(key);
    }

    return { applied, skipped };
  }
}

/** Formats missing from the table get a configurator that only sets the file type. */
export function createWriteConfigurator(
  extension: string,
  tables: WriteNodeTables,
  logger: Logger = createChildLogger({ module: 'WriteNodeConfigurator' }),
): WriteNodeConfigurator {
  const format = tables.formats[extension];
  if (!format) {
    return new WriteNodeConfigurator({ fileType: extension, knobs: [] }, [], logger);
  }
  return new WriteNodeConfigurator(format, tables.common, logger);
}
