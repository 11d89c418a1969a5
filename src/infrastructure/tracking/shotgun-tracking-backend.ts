import { z } from 'zod';

import type {
  EntityLookupScope,
  EntityType,
  PublishedVersion,
  TaskLookupScope,
  TrackingBackend,
  TrackingId,
  VersionSubmission,
} from '../../domain/tracking/index.js';
import { createChildLogger, type Logger } from '../../shared/logger/pino.js';

import { JsonHttpClient, type FetchLike } from './http/json-http-client.js';

const ENTITY_NAMES: Readonly<Record<EntityType, { readonly type: string; readonly collection: string }>> = {
  shot: { type: 'Shot', collection: 'shots' },
  sequence: { type: 'Sequence', collection: 'sequences' },
  asset: { type: 'Asset', collection: 'assets' },
};

const SEARCH_CONTENT_TYPE = 'application/vnd+shotgun.api3_array+json';

const tokenSchema = z.object({ access_token: z.string().min(1) });

const searchSchema = z.object({
  data: z.array(z.object({ id: z.number().int() })),
});

const createdSchema = z.object({
  data: z.object({ id: z.number().int() }),
});

type Filter = readonly [field: string, operator: string, value: unknown];

export interface ShotgunTrackingBackendOptions {
  readonly url: string;
  readonly login: string;
  readonly password: string;
  readonly fetch?: FetchLike;
  readonly logger?: Logger;
}

/**
 * ShotGrid over its REST API (v1). Lookups use `_search` with array filters;
 * a version is created together with a note carrying the comment.
 */
export class ShotgunTrackingBackend implements TrackingBackend {
  public readonly kind = 'shotgun';

  public readonly requiredIdentity = ['project', 'entity'] as const;

  private readonly http: JsonHttpClient;

  private readonly logger: Logger;

  private session: Promise<void> | null = null;

  public constructor(private readonly options: ShotgunTrackingBackendOptions) {
    this.logger = options.logger ?? createChildLogger({ module: 'ShotgunTrackingBackend' });
    this.http = new JsonHttpClient('shotgun', options.url, { fetch: options.fetch, logger: this.logger });
  }

  public async getProjectId(name: string): Promise<TrackingId | null> {
    return this.findOne('projects', [['name', 'is', name]]);
  }

  public async getEntityId(name: string, type: EntityType, scope: EntityLookupScope): Promise<TrackingId | null> {
    const filters: Filter[] = [['code', 'is', name]];
    if (scope.projectId !== null) {
      filters.push(['project', 'is', { type: 'Project', id: scope.projectId }]);
    }
    return this.findOne(ENTITY_NAMES[type].collection, filters);
  }

  public async getTaskId(entityId: TrackingId, taskName: string, scope: TaskLookupScope): Promise<TrackingId | null> {
    return this.findOne('tasks', [
      ['entity', 'is', { type: ENTITY_NAMES[scope.entityType].type, id: entityId }],
      ['content', 'is', taskName],
    ]);
  }

  public async getArtistId(name: string): Promise<TrackingId | null> {
    return this.findOne('human_users', [['name', 'is', name]]);
  }

  public async insertVersion(submission: VersionSubmission): Promise<PublishedVersion> {
    const { identity } = submission;
    const project = { type: 'Project', id: identity.projectId };
    const entity = { type: ENTITY_NAMES[identity.entityType].type, id: identity.entityId };

    const fields: Record<string, unknown> = {
      code: submission.versionName,
      project,
      entity,
      sg_path_to_movie: submission.artifactPath,
      sg_status_list: 'rev',
      description: submission.comment,
    };
    if (identity.taskId !== null) {
      fields.sg_task = { type: 'Task', id: identity.taskId };
    }
    if (identity.artistId !== null) {
      fields.user = { type: 'HumanUser', id: identity.artistId };
    }

    await this.authenticate();
    const version = await this.http.request(createdSchema, {
      method: 'POST',
      path: '/api/v1/entity/versions',
      body: fields,
    });
    this.logger.info({ versionName: submission.versionName, versionId: version.data.id }, 'Version created');

    if (submission.comment !== '') {
      await this.http.request(createdSchema, {
        method: 'POST',
        path: '/api/v1/entity/notes',
        body: {
          content: submission.comment,
          project,
          note_links: [entity, { type: 'Version', id: version.data.id }],
        },
      });
      this.logger.info({ versionId: version.data.id }, 'Comment note added');
    }

    return { id: version.data.id, backend: this.kind, versionName: submission.versionName };
  }

  private async findOne(collection: string, filters: readonly Filter[]): Promise<TrackingId | null> {
    await this.authenticate();
    const result = await this.http.request(searchSchema, {
      method: 'POST',
      path: `/api/v1/entity/${collection}/_search`,
      headers: { 'Content-Type': SEARCH_CONTENT_TYPE },
      body: { filters, fields: ['id'], page: { size: 1 } },
    });
    return result.data[0]?.id ?? null;
  }

  private authenticate(): Promise<void> {
    this.session ??= this.login().catch((error: unknown) => {
      this.session = null;
      throw error;
    });
    return this.session;
  }

  private async login(): Promise<void> {
    const token = await this.http.request(tokenSchema, {
      method: 'POST',
      path: '/api/v1/auth/access_token',
      body: new URLSearchParams({
        grant_type: 'password',
        username: this.options.login,
        password: this.options.password,
      }),
    });
    this.http.setBearer(token.access_token);
    this.logger.debug('Authenticated');
  }
}
