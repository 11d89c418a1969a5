import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, test, vi } from 'vitest';

import type { ResolvedIdentity } from '../../../../src/domain/tracking/index.js';
import { KitsuTrackingBackend } from '../../../../src/infrastructure/tracking/kitsu-tracking-backend.js';

import { silentLogger } from '../media/fakes.js';

import { fakeFetch, jsonBody, reply, type Route } from './fake-fetch.js';

const BASE_URL = 'https://kitsu.example.test';

const ROUTES: Readonly<Record<string, Route>> = {
  'POST /api/auth/login': reply({ access_token: 'tok-k' }),
  'GET /api/data/projects': reply([
    { id: 'p2', name: 'Feature 2' },
    { id: 'p1', name: 'Feature' },
  ]),
  'GET /api/data/projects/p1/shots': reply([
    { id: 's1', name: 'sh010' },
    { id: 's2', name: 'sh020' },
  ]),
  'GET /api/data/task-types': reply([{ id: 'tt1', name: 'Compositing' }]),
  'GET /api/data/entities/s1/task-types/tt1/tasks': reply([{ id: 't1' }, { id: 't9' }]),
  'GET /api/data/persons': reply([
    { id: 'u1', first_name: 'Ada', last_name: 'Lovelace' },
    { id: 'u2', full_name: 'Grace Hopper' },
  ]),
  'GET /api/data/tasks/t1': reply({ id: 't1', task_status_id: 'st-wfa' }),
  'POST /api/actions/tasks/t1/comment': reply({ id: 'c1' }),
  'POST /api/actions/tasks/t1/comments/c1/add-preview': reply({ id: 'pv1' }),
  'POST /api/pictures/preview-files/pv1': reply({}),
};

const identity: ResolvedIdentity = {
  projectName: 'Feature',
  projectId: 'p1',
  entityName: 'sh010',
  entityType: 'shot',
  entityId: 's1',
  taskName: 'Compositing',
  taskId: 't1',
  artistName: 'Ada Lovelace',
  artistId: 'u1',
};

function backendWith(routes: Readonly<Record<string, Route>> = ROUTES) {
  const server = fakeFetch(routes);
  const backend = new KitsuTrackingBackend({
    url: BASE_URL,
    login: 'pipeline@example.test',
    password: 'test-secret',
    fetch: server.fetch,
    logger: silentLogger,
  });
  return { backend, ...server };
}

describe('KitsuTrackingBackend', () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    vi.unstubAllGlobals();
    await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  test('logs in with email and password, then matches the exact project name', async () => {
    const { backend, requests } = backendWith();

    expect(await backend.getProjectId('Feature')).toBe('p1');
    expect(jsonBody(requests[0])).toEqual({ email: 'pipeline@example.test', password: 'test-secret' });
    expect(requests[1]?.query).toEqual({ name: 'Feature' });
    expect(requests[1]?.headers.authorization).toBe('Bearer tok-k');
  });

  test('concurrent lookups share one login', async () => {
    const { backend, requests } = backendWith();

    const [projectId, artistId] = await Promise.all([backend.getProjectId('Feature'), backend.getArtistId('Grace Hopper')]);

    expect([projectId, artistId]).toEqual(['p1', 'u2']);
    expect(requests.filter((request) => request.path === '/api/auth/login')).toHaveLength(1);
  });

  test('logs in again after a failed login', async () => {
    let attempts = 0;
    const { backend } = backendWith({
      ...ROUTES,
      'POST /api/auth/login': () => {
        attempts += 1;
        return attempts === 1 ? reply({ message: 'unavailable' }, 503) : reply({ access_token: 'tok-k' });
      },
    });

    await expect(backend.getProjectId('Feature')).rejects.toMatchObject({ code: 'tracking.request-failed' });
    expect(await backend.getProjectId('Feature')).toBe('p1');
    expect(attempts).toBe(2);
  });

  test('caches entity listings per project', async () => {
    const { backend, requests } = backendWith();

    expect(await backend.getEntityId('sh010', 'shot', { projectId: 'p1' })).toBe('s1');
    expect(await backend.getEntityId('sh020', 'shot', { projectId: 'p1' })).toBe('s2');
    expect(await backend.getEntityId('sh999', 'shot', { projectId: 'p1' })).toBeNull();

    expect(requests.filter((request) => request.path === '/api/data/projects/p1/shots')).toHaveLength(1);
  });

  test('cannot look up entities without a project', async () => {
    const { backend, fetch } = backendWith();

    expect(await backend.getEntityId('sh010', 'shot', { projectId: null })).toBeNull();
    expect(fetch).not.toHaveBeenCalled();
  });

  test('finds the task through its task type', async () => {
    const { backend } = backendWith();

    expect(await backend.getTaskId('s1', 'compositing')).toBe('t1');
    expect(await backend.getTaskId('s1', 'lighting')).toBeNull();
  });

  test('matches artists on full name or first and last name', async () => {
    const { backend } = backendWith();

    expect(await backend.getArtistId('ada lovelace')).toBe('u1');
    expect(await backend.getArtistId('Grace Hopper')).toBe('u2');
    expect(await backend.getArtistId('Alan Turing')).toBeNull();
  });

  test('publishes a comment with the artifact attached as preview', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'kitsu-'));
    tempDirs.push(dir);
    const artifactPath = path.join(dir, 'sh010_v001.mov');
    await writeFile(artifactPath, 'fake-movie');
    const { backend, requests } = backendWith();

    const published = await backend.insertVersion({
      versionName: 'sh010_v001',
      artifactPath,
      comment: 'first pass',
      identity,
    });

    expect(published).toEqual({ id: 'pv1', backend: 'kitsu', versionName: 'sh010_v001' });
    expect(requests.map((request) => `${request.method} ${request.path}`)).toEqual([
      'POST /api/auth/login',
      'GET /api/data/tasks/t1',
      'POST /api/actions/tasks/t1/comment',
      'POST /api/actions/tasks/t1/comments/c1/add-preview',
      'POST /api/pictures/preview-files/pv1',
    ]);
    expect(jsonBody(requests[2])).toEqual({ task_status_id: 'st-wfa', comment: 'first pass', person_id: 'u1' });

    const upload = requests[4]?.body;
    expect(upload).toBeInstanceOf(FormData);
    const file = upload instanceof FormData ? upload.get('file') : null;
    expect(typeof file === 'string' ? file : file?.name).toBe('sh010_v001.mov');
  });

  test('uses the global fetch when none is injected', async () => {
    const server = fakeFetch(ROUTES);
    vi.stubGlobal('fetch', server.fetch);
    const backend = new KitsuTrackingBackend({
      url: BASE_URL,
      login: 'pipeline@example.test',
      password: 'test-secret',
      logger: silentLogger,
    });

    expect(await backend.getProjectId('Feature')).toBe('p1');
    expect(server.fetch).toHaveBeenCalledTimes(2);
  });
});
