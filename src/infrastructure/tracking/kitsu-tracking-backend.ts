import { readFile } from 'node:fs/promises';
import path from 'node:path';

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

import { MemoryCache } from './cache/memory-cache.js';
import { JsonHttpClient, type FetchLike } from './http/json-http-client.js';

const ENTITY_COLLECTIONS: Readonly<Record<EntityType, string>> = {
  shot: 'shots',
  sequence: 'sequences',
  asset: 'assets',
};

const loginSchema = z.object({ access_token: z.string().min(1) });

const namedRecordSchema = z.object({ id: z.string(), name: z.string() });

const namedListSchema = z.array(namedRecordSchema);

const idListSchema = z.array(z.object({ id: z.string() }));

const personListSchema = z.array(
  z.object({
    id: z.string(),
    full_name: z.string().optional(),
    first_name: z.string().default(''),
    last_name: z.string().default(''),
  }),
);

const taskSchema = z.object({ id: z.string(), task_status_id: z.string() });

const createdSchema = z.object({ id: z.string() });

type NamedRecord = z.infer<typeof namedRecordSchema>;

export interface KitsuTrackingBackendOptions {
  readonly url: string;
  readonly login: string;
  readonly password: string;
  readonly fetch?: FetchLike;
  readonly logger?: Logger;
  /** Lifetime of cached per-project entity listings. */
  readonly listingTtlMs?: number;
}

/**
 * Kitsu through the Zou REST API. Versions are published as a task comment
 * with a preview attached, so a resolved task is mandatory.
 */
export class KitsuTrackingBackend implements TrackingBackend {
  public readonly kind = 'kitsu';

  public readonly requiredIdentity = ['task'] as const;

  private readonly http: JsonHttpClient;

  private readonly listings: MemoryCache<NamedRecord[]>;

  private readonly logger: Logger;

  private session: Promise<void> | null = null;

  public constructor(private readonly options: KitsuTrackingBackendOptions) {
    this.logger = options.logger ?? createChildLogger({ module: 'KitsuTrackingBackend' });
    this.http = new JsonHttpClient('kitsu', options.url, { fetch: options.fetch, logger: this.logger });
    this.listings = new MemoryCache({ maxEntries: 32, ttlMs: options.listingTtlMs ?? 10 * 60 * 1000 });
  }

  public async getProjectId(name: string): Promise<TrackingId | null> {
    await this.authenticate();
    const projects = await this.http.request(namedListSchema, {
      method: 'GET',
      path: '/api/data/projects',
      query: { name },
    });
    return projects.find((project) => project.name === name)?.id ?? null;
  }

  public async getEntityId(name: string, type: EntityType, scope: EntityLookupScope): Promise<TrackingId | null> {
    if (scope.projectId === null) {
      this.logger.warn({ entity: name, type }, 'Entity lookup needs a project id');
      return null;
    }

    const collection = ENTITY_COLLECTIONS[type];
    const projectId = String(scope.projectId);
    const entities = await this.listings.getOrLoad(`${projectId}:${collection}`, async () => {
      await this.authenticate();
      return this.http.request(namedListSchema, {
        method: 'GET',
        path: `/api/data/projects/${projectId}/${collection}`,
      });
    });

    return entities.find((entity) => entity.name === name)?.id ?? null;
  }

  public async getTaskId(entityId: TrackingId, taskName: string): Promise<TrackingId | null> {
    await this.authenticate();
    const taskTypes = await this.http.request(namedListSchema, {
      method: 'GET',
      path: '/api/data/task-types',
      query: { name: taskName },
    });

    const taskType = taskTypes.find((candidate) => candidate.name.toLowerCase() === taskName.toLowerCase());
    if (!taskType) {
      this.logger.warn({ taskName }, 'Task type not found');
      return null;
    }

    const tasks = await this.http.request(idListSchema, {
      method: 'GET',
      path: `/api/data/entities/${String(entityId)}/task-types/${taskType.id}/tasks`,
    });
    return tasks[0]?.id ?? null;
  }

  public async getArtistId(name: string): Promise<TrackingId | null> {
    await this.authenticate();
    const people = await this.http.request(personListSchema, { method: 'GET', path: '/api/data/persons' });

    const wanted = name.toLowerCase();
    const person = people.find(
      (candidate) => (candidate.full_name ?? `${candidate.first_name} ${candidate.last_name}`).toLowerCase() === wanted,
    );
    return person?.id ?? null;
  }

  public async insertVersion(submission: VersionSubmission): Promise<PublishedVersion> {
    const taskId = String(submission.identity.taskId);
    await this.authenticate();

    const task = await this.http.request(taskSchema, { method: 'GET', path: `/api/data/tasks/${taskId}` });

    const comment = await this.http.request(createdSchema, {
      method: 'POST',
      path: `/api/actions/tasks/${taskId}/comment`,
      body: {
        task_status_id: task.task_status_id,
        comment: submission.comment,
        ...(submission.identity.artistId !== null ? { person_id: String(submission.identity.artistId) } : {}),
      },
    });

    const preview = await this.http.request(createdSchema, {
      method: 'POST',
      path: `/api/actions/tasks/${taskId}/comments/${comment.id}/add-preview`,
      body: {},
    });

    const form = new FormData();
    form.append('file', new Blob([await readFile(submission.artifactPath)]), path.basename(submission.artifactPath));
    await this.http.request(z.unknown(), {
      method: 'POST',
      path: `/api/pictures/preview-files/${preview.id}`,
      body: form,
    });

    this.logger.info({ versionName: submission.versionName, taskId, previewId: preview.id }, 'Preview uploaded');
    return { id: preview.id, backend: this.kind, versionName: submission.versionName };
  }

  /** Concurrent callers share one login; a failed login is retried on the next call. */
  private authenticate(): Promise<void> {
    this.session ??= this.login().catch((error: unknown) => {
      this.session = null;
      throw error;
    });
    return this.session;
  }

  private async login(): Promise<void> {
    const session = await this.http.request(loginSchema, {
      method: 'POST',
      path: '/api/auth/login',
      body: { email: this.options.login, password: this.options.password },
    });
    this.http.setBearer(session.access_token);
    this.logger.debug('Authenticated');
  }
}
