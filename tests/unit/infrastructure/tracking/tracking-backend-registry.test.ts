import { describe, expect, test } from 'vitest';

import { createTrackingBackend } from '../../../../src/infrastructure/tracking/tracking-backend-registry.js';

const connection = { url: 'https://tracker.example.test', login: 'pipeline', password: 'test-secret' };

function failureOf(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('createTrackingBackend', () => {
  test('builds backends by case-insensitive name', () => {
    expect(createTrackingBackend('Shotgun', connection).kind).toBe('shotgun');
    expect(createTrackingBackend('kitsu', connection).requiredIdentity).toEqual(['task']);
    expect(createTrackingBackend('FTRACK', connection).requiredIdentity).toEqual(['entity']);
    expect(createTrackingBackend('flow', connection).requiredIdentity).toEqual(['project']);
  });

  test('rejects unknown tracking software', () => {
    expect(() => createTrackingBackend('rvio', connection)).toThrow('Unsupported tracking software: rvio');
  });

  test('lists every missing connection setting', () => {
    expect(failureOf(() => createTrackingBackend('kitsu', { url: 'https://tracker.example.test' }))).toMatchObject({
      code: 'tracking.not-configured',
      metadata: { backend: 'kitsu', missing: ['TRACKING_LOGIN', 'TRACKING_PASSWORD'] },
    });
  });

  test('flow only needs a url and a token', () => {
    expect(createTrackingBackend('flow', { url: connection.url, password: 'test-token' }).kind).toBe('flow');
    expect(failureOf(() => createTrackingBackend('flow', { login: 'pipeline' }))).toMatchObject({
      metadata: { backend: 'flow', missing: ['TRACKING_URL', 'TRACKING_PASSWORD'] },
    });
  });
});
