import type {
  EntityType,
  IdentitySlotName,
  ResolvedIdentity,
  TrackingId,
} from '../value-objects/identity.js';

export const TRACKING_BACKEND_KINDS = ['shotgun', 'ftrack', 'kitsu', 'flow'] as const;

export type TrackingBackendKind = (typeof TRACKING_BACKEND_KINDS)[number];

export interface EntityLookupScope {
  readonly projectId: TrackingId | null;
}

export interface TaskLookupScope {
  readonly projectId: TrackingId | null;
  readonly entityType: EntityType;
}

export interface VersionSubmission {
  readonly versionName: string;
  readonly artifactPath: string;
  readonly comment: string;
  readonly identity: ResolvedIdentity;
}

export interface PublishedVersion {
  readonly id: TrackingId;
  readonly backend: TrackingBackendKind;
  readonly versionName: string;
}

/**
 * Narrow façade over a production-tracking service. Lookups return `null`
 * when nothing matches; transport failures reject.
 */
export interface TrackingBackend {
  readonly kind: TrackingBackendKind;
  /** Identity slots `insertVersion` cannot work without. */
  readonly requiredIdentity: readonly IdentitySlotName[];
  getProjectId(name: string): Promise<TrackingId | null>;
  getEntityId(name: string, type: EntityType, scope: EntityLookupScope): Promise<TrackingId | null>;
  getTaskId(entityId: TrackingId, taskName: string, scope: TaskLookupScope): Promise<TrackingId | null>;
  getArtistId(name: string): Promise<TrackingId | null>;
  insertVersion(submission: VersionSubmission): Promise<PublishedVersion>;
}

export function isTrackingBackendKind(value: string): value is TrackingBackendKind {
  return TRACKING_BACKEND_KINDS.some((kind) => kind === value);
}
