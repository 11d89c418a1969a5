export type TrackingId = string | number;

export const ENTITY_TYPES = ['shot', 'sequence', 'asset'] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export const IDENTITY_SLOTS = ['project', 'entity', 'task', 'artist'] as const;

export type IdentitySlotName = (typeof IDENTITY_SLOTS)[number];

/**
 * Resolution state of one identity slot. `absent` records that the tracking
 * system was asked and had no match, so the lookup is never repeated.
 */
export type SlotState =
  | { readonly status: 'unresolved' }
  | { readonly status: 'present'; readonly id: TrackingId }
  | { readonly status: 'absent' };

export interface NamedSeed {
  readonly name?: string;
  readonly id?: TrackingId;
}

export interface EntitySeed extends NamedSeed {
  readonly type?: EntityType;
}

export interface IdentitySeed {
  readonly project?: NamedSeed;
  readonly entity?: EntitySeed;
  readonly task?: NamedSeed;
  readonly artist?: NamedSeed;
}

export interface ResolvedIdentity {
  readonly projectName: string | null;
  readonly projectId: TrackingId | null;
  readonly entityName: string | null;
  readonly entityType: EntityType;
  readonly entityId: TrackingId | null;
  readonly taskName: string | null;
  readonly taskId: TrackingId | null;
  readonly artistName: string | null;
  readonly artistId: TrackingId | null;
}

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some((type) => type === value);
}

export function slotId(state: SlotState): TrackingId | null {
  return state.status === 'present' ? state.id : null;
}
