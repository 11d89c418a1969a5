import { describe, expect, it } from 'vitest';

import { identityFromEnv, IdentityResolver } from '../../../../src/application/tracking/identity-resolver.js';

import { silentLogger } from '../../infrastructure/media/fakes.js';

import { fakeTrackingBackend } from './fake-tracking-backend.js';

describe('IdentityResolver', () => {
  it('never looks up a slot that was given an id', async () => {
    const backend = fakeTrackingBackend();
    const resolver = new IdentityResolver(backend, { project: { name: 'Feature', id: 5 } }, { logger: silentLogger });

    expect(await resolver.fetchProjectId()).toBe(5);
    expect(backend.getProjectId).not.toHaveBeenCalled();
  });

  it('looks a name up once and remembers the id', async () => {
    const backend = fakeTrackingBackend();
    const resolver = new IdentityResolver(backend, { project: { name: 'Feature' } }, { logger: silentLogger });

    expect(await resolver.fetchProjectId()).toBe(12);
    expect(await resolver.fetchProjectId()).toBe(12);
    expect(backend.getProjectId).toHaveBeenCalledTimes(1);
    expect(backend.getProjectId).toHaveBeenCalledWith('Feature');
    expect(resolver.state('project')).toEqual({ status: 'present', id: 12 });
  });

  it('remembers a confirmed miss', async () => {
    const backend = fakeTrackingBackend();
    backend.getProjectId.mockResolvedValue(null);
    const resolver = new IdentityResolver(backend, { project: { name: 'Unknown' } }, { logger: silentLogger });

    expect(await resolver.fetchProjectId()).toBeNull();
    expect(await resolver.fetchProjectId()).toBeNull();
    expect(backend.getProjectId).toHaveBeenCalledTimes(1);
    expect(resolver.state('project')).toEqual({ status: 'absent' });
  });

  it('retries a lookup that failed', async () => {
    const backend = fakeTrackingBackend();
    backend.getProjectId.mockRejectedValueOnce(new Error('timeout'));
    const resolver = new IdentityResolver(backend, { project: { name: 'Feature' } }, { logger: silentLogger });

    expect(await resolver.fetchProjectId()).toBeNull();
    expect(resolver.state('project')).toEqual({ status: 'unresolved' });
    expect(await resolver.fetchProjectId()).toBe(12);
    expect(backend.getProjectId).toHaveBeenCalledTimes(2);
  });

  it('shares one request between concurrent callers', async () => {
    const backend = fakeTrackingBackend();
    const resolver = new IdentityResolver(backend, { project: { name: 'Feature' } }, { logger: silentLogger });

    expect(await Promise.all([resolver.fetchProjectId(), resolver.fetchProjectId()])).toEqual([12, 12]);
    expect(backend.getProjectId).toHaveBeenCalledTimes(1);
  });

  it('scopes entity lookups to the project and entity type', async () => {
    const backend = fakeTrackingBackend();
    const resolver = new IdentityResolver(
      backend,
      { project: { name: 'Feature' }, entity: { name: 'sq01', type: 'sequence' } },
      { logger: silentLogger },
    );

    expect(await resolver.fetchEntityId()).toBe(345);
    expect(backend.getEntityId).toHaveBeenCalledWith('sq01', 'sequence', { projectId: 12 });
  });

  it('skips the task lookup without an entity', async () => {
    const backend = fakeTrackingBackend();
    const resolver = new IdentityResolver(backend, { task: { name: 'comp' } }, { logger: silentLogger });

    expect(await resolver.fetchTaskId()).toBeNull();
    expect(backend.getTaskId).not.toHaveBeenCalled();
    expect(resolver.state('task')).toEqual({ status: 'unresolved' });
  });

  it('resolves every slot in dependency order', async () => {
    const backend = fakeTrackingBackend();
    const resolver = new IdentityResolver(
      backend,
      {
        project: { name: 'Feature' },
        entity: { name: 'sh010' },
        task: { name: 'comp' },
        artist: { name: 'Ada' },
      },
      { logger: silentLogger },
    );

    expect(await resolver.resolveAll()).toEqual({
      projectName: 'Feature',
      projectId: 12,
      entityName: 'sh010',
      entityType: 'shot',
      entityId: 345,
      taskName: 'comp',
      taskId: 31,
      artistName: 'Ada',
      artistId: 8,
    });
    expect(backend.getTaskId).toHaveBeenCalledWith(345, 'comp', { projectId: 12, entityType: 'shot' });
    expect(resolver.describe()).toMatchObject({ backend: 'shotgun', task: { name: 'comp', state: 'present' } });
  });
});

describe('identityFromEnv', () => {
  it('reads names and ids, turning digit-only ids into numbers', () => {
    expect(
      identityFromEnv({
        PROJECT: 'Feature',
        PROJECT_ID: '',
        ENTITY_NAME: 'sh010',
        ENTITY_ID: '345',
        ENTITY_TYPE: 'Asset',
        TASK_NAME: ' comp ',
        ARTIST_ID: 'u-7',
      }),
    ).toEqual({
      project: { name: 'Feature' },
      entity: { name: 'sh010', id: 345, type: 'asset' },
      task: { name: 'comp' },
      artist: { id: 'u-7' },
    });
  });

  it('defaults the entity type to shot', () => {
    expect(identityFromEnv({}).entity?.type).toBe('shot');
  });

  it('rejects unknown entity types', () => {
    expect(() => identityFromEnv({ ENTITY_TYPE: 'episode' })).toThrow('Validation failed for the provided payload.');
  });
});
