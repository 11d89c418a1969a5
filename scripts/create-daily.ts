#!/usr/bin/env node
import { CreateMediaCommand } from '../src/application/media/index.js';
import { identityFromEnv, PublishVersionCommand } from '../src/application/tracking/index.js';
import { isEntityType, type IdentitySeed } from '../src/domain/tracking/index.js';
import { buildMediaPipeline, buildTrackingPipeline } from '../src/infrastructure/daily-pipeline.js';
import { loadConfigFromProcess } from '../src/shared/config/env.js';
import { AppError } from '../src/shared/errors/app-error.js';
import { configureLogger, createChildLogger } from '../src/shared/logger/pino.js';

import { defaultVersionName, parseCreateDailyArgs, type IdentityOverrides } from './create-daily-args.js';

function applyOverrides(seed: IdentitySeed, overrides: IdentityOverrides): IdentitySeed {
  const entityType = overrides.entityType?.toLowerCase();
  if (entityType !== undefined && !isEntityType(entityType)) {
    throw AppError.unsupported('tracking.unknown-entity-type', `Unsupported entity type: ${overrides.entityType ?? ''}`, {
      entityType: overrides.entityType,
    });
  }

  return {
    project: overrides.project ? { name: overrides.project } : seed.project,
    entity: {
      ...(overrides.entity ? { name: overrides.entity } : seed.entity),
      type: entityType ?? seed.entity?.type ?? 'shot',
    },
    task: overrides.task ? { name: overrides.task } : seed.task,
    artist: overrides.artist ? { name: overrides.artist } : seed.artist,
  };
}

async function main(): Promise<void> {
  const config = loadConfigFromProcess();
  const logger = configureLogger(config.logLevel);
  const args = parseCreateDailyArgs(process.argv.slice(2));

  const media = buildMediaPipeline(config);
  const outcome = await media.handler.execute(new CreateMediaCommand(args.media));
  logger.info({ outputPath: outcome.outputPath }, 'Daily created');

  if (!args.tracking) {
    return;
  }

  const seed = applyOverrides(identityFromEnv(process.env), args.identity);
  const tracking = buildTrackingPipeline(config, args.tracking, seed);
  logger.info({ identity: tracking.identities.describe() }, 'Publishing daily');

  const version = await tracking.handler.execute(
    new PublishVersionCommand({
      versionName: defaultVersionName(outcome.outputPath, args.versionName),
      artifactPath: outcome.outputPath,
      comment: args.comment,
    }),
  );
  logger.info({ versionId: version.id, backend: version.backend }, 'Daily published');
}

main().catch((error: unknown) => {
  createChildLogger({ module: 'create-daily' }).error({ error }, 'create-daily failed');
  process.exitCode = 1;
});
