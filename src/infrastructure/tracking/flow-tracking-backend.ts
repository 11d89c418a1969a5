import { z } from 'zod';

import type {
  EntityLookupScope,
  EntityType,
  PublishedVersion,
  TrackingBackend,
  TrackingId,
  VersionSubmission,
} from '../../domain/tracking/index.js';
import { createChildLogger, type Logger } from '../../shared/logger/pino.js';

import { JsonHttpClient, type FetchLike } from './http/json-http-client.js';

const ENTITY_COLLECTIONS: Readonly<Record<EntityType, string>> = {
  shot: 'shots',
  sequence: 'sequences',
  asset: 'assets',
};

const MEDIA_TYPE = 'application/vnd.api+json';

const resourceSchema = z.object({
  id: z.string(),
  attributes: z.object({ name: z.string() }),
});

const collectionSchema = z.object({ data: z.array(resourceSchema) });

const createdSchema = z.object({ data: z.object({ id: z.string() }) });

export interface FlowTrackingBackendOptions {
  readonly url: string;
  /** API token sent as a bearer credential. */
  readonly token: string;
  readonly fetch?: FetchLike;
  readonly logger?: Logger;
}

/**
 * Flow over its JSON:API endpoints. Lookups filter collections by name and
 * a version is a single `versions` resource pointing at the movie.
 */
export class FlowTrackingBackend implements TrackingBackend {
  public readonly kind = 'flow';

  public readonly requiredIdentity = ['project'] as const;

  private readonly http: JsonHttpClient;

  private readonly logger: Logger;

  public constructor(options: FlowTrackingBackendOptions) {
    this.logger = options.logger ?? createChildLogger({ module: 'FlowTrackingBackend' });
    this.http = new JsonHttpClient('flow', options.url, { fetch: options.fetch, logger: this.logger });
    this.http.setBearer(options.token);
  }

  public async getProjectId(name: string): Promise<TrackingId | null> {
    return this.findByName('projects', name, {});
  }

  public async getEntityId(name: string, type: EntityType, scope: EntityLookupScope): Promise<TrackingId | null> {
    const filters: Record<string, string> = {};
    if (scope.projectId !== null) {
      filters['filter[project-id]'] = String(scope.projectId);
    }
    return this.findByName(ENTITY_COLLECTIONS[type], name, filters);
  }

  public async getTaskId(entityId: TrackingId, taskName: string): Promise<TrackingId | null> {
    return this.findByName('tasks', taskName, { 'filter[entity-id]': String(entityId) });
  }

  public async getArtistId(name: string): Promise<TrackingId | null> {
    return this.findByName('users', name, {});
  }

  public async insertVersion(submission: VersionSubmission): Promise<PublishedVersion> {
    const { identity } = submission;
    const attributes: Record<string, string> = {
      name: submission.versionName,
      'project-id': String(identity.projectId),
      'video-path': submission.artifactPath,
      description: submission.comment,
    };
    if (identity.entityId !== null) {
      attributes['entity-id'] = String(identity.entityId);
      attributes['entity-type'] = ENTITY_COLLECTIONS[identity.entityType];
    }
    if (identity.taskId !== null) {
      attributes['task-id'] = String(identity.taskId);
    }
    if (identity.artistId !== null) {
      attributes['user-id'] = String(identity.artistId);
    }

    const created = await this.http.request(createdSchema, {
      method: 'POST',
      path: '/versions',
      headers: { Accept: MEDIA_TYPE, 'Content-Type': MEDIA_TYPE },
      body: { data: { type: 'versions', attributes } },
    });

    this.logger.info({ versionName: submission.versionName, versionId: created.data.id }, 'Version created');
    return { id: created.data.id, backend: this.kind, versionName: submission.versionName };
  }

  private async findByName(
    collection: string,
    name: string,
    filters: Readonly<Record<string, string>>,
  ): Promise<TrackingId | null> {
    const result = await this.http.request(collectionSchema, {
      method: 'GET',
      path: `/${collection}`,
      headers: { Accept: MEDIA_TYPE },
      query: { 'filter[name]': name, ...filters },
    });
    return result.data.find((resource) => resource.attributes.name === name)?.id ?? null;
  }
}
