import { MediaRequest } from '../../../domain/media/index.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import type { CreateMediaCommand } from '../commands/create-media.command.js';
import {
  createMediaCommandSchema,
  withSlateDefaults,
  type CreateMediaInput,
  type CreateMediaPayload,
} from '../dto/create-media.dto.js';
import type { MediaSynthesizer } from '../media-synthesizer.js';

export interface CreateMediaOutcome {
  readonly requestId: string;
  readonly outputPath: string;
  readonly artifacts: readonly string[];
}

export class CreateMediaHandler {
  private readonly logger = createChildLogger({ module: 'CreateMediaHandler' });

  public constructor(private readonly synthesizer: Pick<MediaSynthesizer, 'synthesize'>) {}

  public async execute(command: CreateMediaCommand): Promise<CreateMediaOutcome> {
    const payload = this.validate(command.payload);

    this.logger.info({ requestId: payload.id, backend: payload.backend }, 'Starting media creation');

    try {
      const request = MediaRequest.create({
        id: payload.id,
        backend: payload.backend,
        inputPath: payload.inputPath,
        outputPath: payload.outputPath,
        resolution: payload.resolution,
        extension: payload.extension,
        frameRate: payload.frameRate,
        options: payload.options,
        slate: payload.slate ? withSlateDefaults(payload.slate, payload.resolution) : undefined,
        templatePath: payload.templatePath,
      });

      const result = await this.synthesizer.synthesize(request);

      this.logger.info(
        { requestId: payload.id, outputPath: result.outputPath, artifacts: result.artifacts.length },
        'Media creation completed',
      );

      return { requestId: payload.id, outputPath: result.outputPath, artifacts: result.artifacts };
    } catch (error) {
      this.logger.error({ requestId: payload.id, error }, 'Media creation failed');
      throw AppError.fromUnknown(error, 'media.failure');
    }
  }

  private validate(payload: CreateMediaInput): CreateMediaPayload {
    const parsed = createMediaCommandSchema.safeParse(payload);

    if (!parsed.success) {
      const error = AppError.validation('media.invalid-payload', {
        issues: parsed.error.issues,
      });
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid media payload received');
      throw error;
    }

    return parsed.data;
  }
}
