import type { PublishedVersion } from '../../../domain/tracking/index.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import type { PublishVersionCommand } from '../commands/publish-version.command.js';
import {
  publishVersionCommandSchema,
  type PublishVersionInput,
  type PublishVersionPayload,
} from '../dto/publish-version.dto.js';
import type { VersionPublisher } from '../version-publisher.js';

export class PublishVersionHandler {
  private readonly logger = createChildLogger({ module: 'PublishVersionHandler' });

  public constructor(private readonly publisher: Pick<VersionPublisher, 'publish'>) {}

  public async execute(command: PublishVersionCommand): Promise<PublishedVersion> {
    const payload = this.validate(command.payload);

    try {
      return await this.publisher.publish(payload.versionName, payload.artifactPath, payload.comment);
    } catch (error) {
      this.logger.error({ versionName: payload.versionName, error }, 'Version publish failed');
      throw AppError.fromUnknown(error, 'tracking.failure');
    }
  }

  private validate(payload: PublishVersionInput): PublishVersionPayload {
    const parsed = publishVersionCommandSchema.safeParse(payload);

    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid publish payload received');
      throw AppError.validation('tracking.invalid-payload', { issues: parsed.error.issues });
    }

    return parsed.data;
  }
}
