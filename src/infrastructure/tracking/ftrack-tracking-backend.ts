import { randomUUID } from 'node:crypto';
import path from 'node:path';

import { z } from 'zod';

import {
  TrackingErrors,
  type EntityLookupScope,
  type EntityType,
  type PublishedVersion,
  type TrackingBackend,
  type TrackingId,
  type VersionSubmission,
} from '../../domain/tracking/index.js';
import { createChildLogger, type Logger } from '../../shared/logger/pino.js';

import { JsonHttpClient, type FetchLike } from './http/json-http-client.js';

const ENTITY_TYPES: Readonly<Record<EntityType, string>> = {
  shot: 'Shot',
  sequence: 'Sequence',
  asset: 'AssetBuild',
};

/** Upload asset type and the location that records plain file paths. */
const ASSET_TYPE_SHORT = 'upload';
const UNMANAGED_LOCATION = 'ftrack.unmanaged';

const idRecordSchema = z.object({ id: z.string() });

const queryResultSchema = z.object({ data: z.array(idRecordSchema) });

const userSchema = z.object({
  id: z.string(),
  username: z.string(),
  first_name: z.string().nullable().default(''),
  last_name: z.string().nullable().default(''),
});

const createdSchema = z.object({ data: idRecordSchema });

type Operation =
  | { readonly action: 'query'; readonly expression: string }
  | { readonly action: 'create'; readonly entity_type: string; readonly entity_data: Record<string, unknown> };

/** Quotes a value for the ftrack query language. */
export function ftrackString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function create(entityType: string, data: Record<string, unknown>): Operation {
  return { action: 'create', entity_type: entityType, entity_data: { __entity_type__: entityType, ...data } };
}

export interface FtrackTrackingBackendOptions {
  readonly url: string;
  /** API user name. */
  readonly login: string;
  readonly apiKey: string;
  readonly fetch?: FetchLike;
  readonly logger?: Logger;
  readonly generateId?: () => string;
}

/**
 * ftrack through its JSON operations endpoint. A version lands on an asset
 * named after it under the resolved entity; the movie is registered as an
 * unmanaged component so the path is kept as-is.
 */
export class FtrackTrackingBackend implements TrackingBackend {
  public readonly kind = 'ftrack';

  public readonly requiredIdentity = ['entity'] as const;

  private readonly http: JsonHttpClient;

  private readonly logger: Logger;

  private readonly generateId: () => string;

  public constructor(private readonly options: FtrackTrackingBackendOptions) {
    this.logger = options.logger ?? createChildLogger({ module: 'FtrackTrackingBackend' });
    this.http = new JsonHttpClient('ftrack', options.url, { fetch: options.fetch, logger: this.logger });
    this.generateId = options.generateId ?? randomUUID;
  }

  public async getProjectId(name: string): Promise<TrackingId | null> {
    return this.queryOne(`select id from Project where name is ${ftrackString(name)}`);
  }

  public async getEntityId(name: string, type: EntityType, scope: EntityLookupScope): Promise<TrackingId | null> {
    const conditions = [`name is ${ftrackString(name)}`];
    if (scope.projectId !== null) {
      conditions.push(`project_id is ${ftrackString(String(scope.projectId))}`);
    }
    return this.queryOne(`select id from ${ENTITY_TYPES[type]} where ${conditions.join(' and ')}`);
  }

  public async getTaskId(entityId: TrackingId, taskName: string): Promise<TrackingId | null> {
    return this.queryOne(
      `select id from Task where parent_id is ${ftrackString(String(entityId))} and name is ${ftrackString(taskName)}`,
    );
  }

  public async getArtistId(name: string): Promise<TrackingId | null> {
    const [result] = await this.call(z.tuple([z.object({ data: z.array(userSchema) })]), [
      { action: 'query', expression: 'select id, username, first_name, last_name from User' },
    ]);

    const wanted = name.toLowerCase();
    const user = result.data.find(
      (candidate) =>
        candidate.username.toLowerCase() === wanted ||
        `${candidate.first_name ?? ''} ${candidate.last_name ?? ''}`.toLowerCase() === wanted,
    );
    return user?.id ?? null;
  }

  public async insertVersion(submission: VersionSubmission): Promise<PublishedVersion> {
    const { identity, versionName } = submission;
    const entityId = String(identity.entityId);

    const [assets, assetTypes, locations] = await this.call(
      z.tuple([queryResultSchema, queryResultSchema, queryResultSchema]),
      [
        {
          action: 'query',
          expression: `select id from Asset where name is ${ftrackString(versionName)} and context_id is ${ftrackString(entityId)}`,
        },
        { action: 'query', expression: `select id from AssetType where short is ${ftrackString(ASSET_TYPE_SHORT)}` },
        { action: 'query', expression: `select id from Location where name is ${ftrackString(UNMANAGED_LOCATION)}` },
      ],
    );

    const location = locations.data[0];
    if (!location) {
      throw TrackingErrors.recordMissing(this.kind, `location ${UNMANAGED_LOCATION}`);
    }

    const operations: Operation[] = [];
    let assetId = assets.data[0]?.id;
    if (assetId === undefined) {
      const assetType = assetTypes.data[0];
      if (!assetType) {
        throw TrackingErrors.recordMissing(this.kind, `asset type ${ASSET_TYPE_SHORT}`, { versionName });
      }
      assetId = this.generateId();
      operations.push(create('Asset', { id: assetId, name: versionName, context_id: entityId, type_id: assetType.id }));
    }

    const versionId = this.generateId();
    const componentId = this.generateId();
    const version: Record<string, unknown> = { id: versionId, asset_id: assetId, comment: submission.comment };
    if (identity.taskId !== null) {
      version.task_id = String(identity.taskId);
    }
    if (identity.artistId !== null) {
      version.user_id = String(identity.artistId);
    }

    operations.push(
      create('AssetVersion', version),
      create('FileComponent', {
        id: componentId,
        name: 'main',
        version_id: versionId,
        file_type: path.extname(submission.artifactPath),
      }),
      create('ComponentLocation', {
        component_id: componentId,
        location_id: location.id,
        resource_identifier: submission.artifactPath,
      }),
    );

    await this.call(z.array(createdSchema), operations);
    this.logger.info({ versionName, versionId, assetId }, 'Version created');
    return { id: versionId, backend: this.kind, versionName };
  }

  private async queryOne(expression: string): Promise<TrackingId | null> {
    const [result] = await this.call(z.tuple([queryResultSchema]), [{ action: 'query', expression }]);
    return result.data[0]?.id ?? null;
  }

  private async call<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, operations: readonly Operation[]): Promise<T> {
    return this.http.request(schema, {
      method: 'POST',
      path: '/api',
      headers: { 'ftrack-user': this.options.login, 'ftrack-api-key': this.options.apiKey },
      body: operations,
    });
  }
}
