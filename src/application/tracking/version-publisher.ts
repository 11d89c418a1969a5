import {
  TrackingErrors,
  type IdentitySlotName,
  type PublishedVersion,
  type ResolvedIdentity,
  type TrackingBackend,
  type TrackingId,
} from '../../domain/tracking/index.js';
import { createChildLogger, type Logger } from '../../shared/logger/pino.js';

import type { IdentityResolver } from './identity-resolver.js';

function idFor(identity: ResolvedIdentity, slot: IdentitySlotName): TrackingId | null {
  switch (slot) {
    case 'project':
      return identity.projectId;
    case 'entity':
      return identity.entityId;
    case 'task':
      return identity.taskId;
    case 'artist':
      return identity.artistId;
  }
}

export function missingIdentity(
  identity: ResolvedIdentity,
  required: readonly IdentitySlotName[],
): IdentitySlotName[] {
  return required.filter((slot) => idFor(identity, slot) === null);
}

export class VersionPublisher {
  private readonly logger: Logger;

  public constructor(
    private readonly backend: TrackingBackend,
    private readonly identities: Pick<IdentityResolver, 'resolveAll' | 'describe'>,
    options: { logger?: Logger } = {},
  ) {
    this.logger = options.logger ?? createChildLogger({ module: 'VersionPublisher', backend: backend.kind });
  }

  public async publish(versionName: string, artifactPath: string, comment: string): Promise<PublishedVersion> {
    const identity = await this.identities.resolveAll();

    const missing = missingIdentity(identity, this.backend.requiredIdentity);
    if (missing.length > 0) {
      this.logger.error({ versionName, missing, identity: this.identities.describe() }, 'Identity incomplete');
      throw TrackingErrors.missingIdentity(this.backend.kind, missing, versionName);
    }

    const published = await this.backend.insertVersion({ versionName, artifactPath, comment, identity });
    this.logger.info({ versionName, versionId: published.id }, 'Version published');
    return published;
  }
}
