import { AppError } from '../../shared/errors/app-error.js';
import type { IdentitySlotName } from './value-objects/identity.js';

export const TRACKING_ERROR_CODES = {
  missingIdentity: 'tracking.missing-identity',
  unknownBackend: 'tracking.unknown-backend',
  requestFailed: 'tracking.request-failed',
  notConfigured: 'tracking.not-configured',
  recordMissing: 'tracking.record-missing',
} as const;

export const TrackingErrors = {
  missingIdentity(backend: string, missing: readonly IdentitySlotName[], versionName: string): AppError {
    return AppError.of(
      TRACKING_ERROR_CODES.missingIdentity,
      `Cannot publish ${versionName} to ${backend}: unresolved ${missing.join(', ')} id`,
      { backend, missing, versionName },
    );
  },

  unknownBackend(name: string, known: readonly string[]): AppError {
    return AppError.of(TRACKING_ERROR_CODES.unknownBackend, `Unsupported tracking software: ${name}`, {
      name,
      known,
    });
  },

  requestFailed(
    backend: string,
    request: { method: string; url: string; status?: number; body?: string },
    cause?: unknown,
  ): AppError {
    const status = request.status === undefined ? 'network error' : `HTTP ${request.status}`;
    return AppError.of(
      TRACKING_ERROR_CODES.requestFailed,
      `${backend} request ${request.method} ${request.url} failed (${status})`,
      { backend, ...request },
      cause,
    );
  },

  notConfigured(backend: string, missing: readonly string[]): AppError {
    return AppError.of(
      TRACKING_ERROR_CODES.notConfigured,
      `${backend} tracking is missing configuration: ${missing.join(', ')}`,
      { backend, missing },
    );
  },

  recordMissing(backend: string, record: string, metadata: Record<string, unknown> = {}): AppError {
    return AppError.of(TRACKING_ERROR_CODES.recordMissing, `${backend} has no ${record}`, {
      backend,
      record,
      ...metadata,
    });
  },
};
