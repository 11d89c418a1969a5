import { describe, expect, test } from 'vitest';

import type { ResolvedIdentity } from '../../../../src/domain/tracking/index.js';
import { ShotgunTrackingBackend } from '../../../../src/infrastructure/tracking/shotgun-tracking-backend.js';

import { silentLogger } from '../media/fakes.js';

import { fakeFetch, jsonBody, reply, type Route } from './fake-fetch.js';

const identity: ResolvedIdentity = {
  projectName: 'Feature',
  projectId: 12,
  entityName: 'sh010',
  entityType: 'shot',
  entityId: 345,
  taskName: null,
  taskId: null,
  artistName: 'Ada',
  artistId: 8,
};

function backendWith(routes: Readonly<Record<string, Route>>) {
  const server = fakeFetch({ 'POST /api/v1/auth/access_token': reply({ access_token: 'tok-1' }), ...routes });
  const backend = new ShotgunTrackingBackend({
    url: 'https://studio.example.test',
    login: 'pipeline',
    password: 'test-secret',
    fetch: server.fetch,
    logger: silentLogger,
  });
  return { backend, ...server };
}

describe('ShotgunTrackingBackend', () => {
  test('authenticates once with the password grant', async () => {
    const { backend, requests } = backendWith({
      'POST /api/v1/entity/projects/_search': reply({ data: [{ id: 12 }] }),
      'POST /api/v1/entity/human_users/_search': reply({ data: [{ id: 8 }] }),
    });

    await backend.getProjectId('Feature');
    await backend.getArtistId('Ada');

    const logins = requests.filter((request) => request.path === '/api/v1/auth/access_token');
    expect(logins).toHaveLength(1);
    expect(String(logins[0]?.body)).toBe('grant_type=password&username=pipeline&password=test-secret');
  });

  test('concurrent lookups share one login', async () => {
    const { backend, requests } = backendWith({
      'POST /api/v1/entity/projects/_search': reply({ data: [{ id: 12 }] }),
      'POST /api/v1/entity/human_users/_search': reply({ data: [{ id: 8 }] }),
    });

    expect(await Promise.all([backend.getProjectId('Feature'), backend.getArtistId('Ada')])).toEqual([12, 8]);
    expect(requests.filter((request) => request.path === '/api/v1/auth/access_token')).toHaveLength(1);
  });

  test('searches projects by name with array filters', async () => {
    const { backend, requests } = backendWith({
      'POST /api/v1/entity/projects/_search': reply({ data: [{ id: 12 }] }),
    });

    expect(await backend.getProjectId('Feature')).toBe(12);
    expect(requests[1]?.headers).toMatchObject({
      authorization: 'Bearer tok-1',
      'content-type': 'application/vnd+shotgun.api3_array+json',
    });
    expect(jsonBody(requests[1])).toEqual({
      filters: [['name', 'is', 'Feature']],
      fields: ['id'],
      page: { size: 1 },
    });
  });

  test('scopes entity lookups to the project and maps the entity type', async () => {
    const { backend, requests } = backendWith({
      'POST /api/v1/entity/sequences/_search': reply({ data: [{ id: 77 }] }),
    });

    expect(await backend.getEntityId('sq01', 'sequence', { projectId: 12 })).toBe(77);
    expect(jsonBody(requests[1])).toMatchObject({
      filters: [
        ['code', 'is', 'sq01'],
        ['project', 'is', { type: 'Project', id: 12 }],
      ],
    });
  });

  test('returns null when a search matches nothing', async () => {
    const { backend, requests } = backendWith({
      'POST /api/v1/entity/tasks/_search': reply({ data: [] }),
    });

    expect(await backend.getTaskId(345, 'comp', { projectId: 12, entityType: 'shot' })).toBeNull();
    expect(jsonBody(requests[1])).toMatchObject({
      filters: [
        ['entity', 'is', { type: 'Shot', id: 345 }],
        ['content', 'is', 'comp'],
      ],
    });
  });

  test('creates a version and a note carrying the comment', async () => {
    const { backend, requests } = backendWith({
      'POST /api/v1/entity/versions': reply({ data: { id: 901 } }),
      'POST /api/v1/entity/notes': reply({ data: { id: 55 } }),
    });

    const published = await backend.insertVersion({
      versionName: 'sh010_comp_v003',
      artifactPath: '/dailies/sh010_comp_v003.mov',
      comment: 'fixed edge',
      identity,
    });

    expect(published).toEqual({ id: 901, backend: 'shotgun', versionName: 'sh010_comp_v003' });
    expect(jsonBody(requests[1])).toEqual({
      code: 'sh010_comp_v003',
      project: { type: 'Project', id: 12 },
      entity: { type: 'Shot', id: 345 },
      sg_path_to_movie: '/dailies/sh010_comp_v003.mov',
      sg_status_list: 'rev',
      description: 'fixed edge',
      user: { type: 'HumanUser', id: 8 },
    });
    expect(jsonBody(requests[2])).toEqual({
      content: 'fixed edge',
      project: { type: 'Project', id: 12 },
      note_links: [
        { type: 'Shot', id: 345 },
        { type: 'Version', id: 901 },
      ],
    });
  });

  test('skips the note without a comment', async () => {
    const { backend, requests } = backendWith({
      'POST /api/v1/entity/versions': reply({ data: { id: 902 } }),
    });

    await backend.insertVersion({
      versionName: 'sh010_v004',
      artifactPath: '/dailies/sh010_v004.mov',
      comment: '',
      identity: { ...identity, taskId: 31 },
    });

    expect(requests.map((request) => request.path)).toEqual([
      '/api/v1/auth/access_token',
      '/api/v1/entity/versions',
    ]);
    expect(jsonBody(requests[1])).toMatchObject({ sg_task: { type: 'Task', id: 31 } });
  });

  test('fails when the login is rejected', async () => {
    const { backend } = backendWith({
      'POST /api/v1/auth/access_token': { status: 401, body: '{"errors":[]}' },
    });

    await expect(backend.getProjectId('Feature')).rejects.toMatchObject({
      code: 'tracking.request-failed',
      metadata: { backend: 'shotgun', status: 401 },
    });
  });
});
