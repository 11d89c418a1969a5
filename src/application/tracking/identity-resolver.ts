import { z } from 'zod';

import {
  ENTITY_TYPES,
  slotId,
  type EntityType,
  type IdentitySeed,
  type IdentitySlotName,
  type NamedSeed,
  type ResolvedIdentity,
  type SlotState,
  type TrackingBackend,
  type TrackingId,
} from '../../domain/tracking/index.js';
import { AppError } from '../../shared/errors/app-error.js';
import { createChildLogger, type Logger } from '../../shared/logger/pino.js';

const UNRESOLVED: SlotState = { status: 'unresolved' };

function initialState(seed: NamedSeed | undefined): SlotState {
  return seed?.id !== undefined ? { status: 'present', id: seed.id } : UNRESOLVED;
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

const optionalId = optionalText.transform((value): TrackingId | undefined =>
  value !== undefined && /^\d+$/.test(value) ? Number.parseInt(value, 10) : value,
);

const identityEnvSchema = z.object({
  PROJECT: optionalText,
  PROJECT_ID: optionalId,
  ENTITY_NAME: optionalText,
  ENTITY_ID: optionalId,
  ENTITY_TYPE: optionalText
    .transform((value) => value?.toLowerCase())
    .pipe(z.enum(ENTITY_TYPES).optional()),
  TASK_NAME: optionalText,
  TASK_ID: optionalId,
  ARTIST_NAME: optionalText,
  ARTIST_ID: optionalId,
});

/** Builds the starting identity from the shell environment. Digit-only ids become numbers. */
export function identityFromEnv(env: NodeJS.ProcessEnv): IdentitySeed {
  const parsed = identityEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw AppError.validation('tracking.invalid-identity-env', { issues: parsed.error.issues });
  }

  const values = parsed.data;
  return {
    project: { name: values.PROJECT, id: values.PROJECT_ID },
    entity: { name: values.ENTITY_NAME, id: values.ENTITY_ID, type: values.ENTITY_TYPE ?? 'shot' },
    task: { name: values.TASK_NAME, id: values.TASK_ID },
    artist: { name: values.ARTIST_NAME, id: values.ARTIST_ID },
  };
}

/**
 * Lazily maps names to tracking-system ids. Each slot is looked up at most
 * once: a match and a confirmed miss are both remembered, while a failed
 * request leaves the slot to be retried on the next access.
 */
export class IdentityResolver {
  private readonly slots: Record<IdentitySlotName, SlotState>;

  private readonly pending = new Map<IdentitySlotName, Promise<TrackingId | null>>();

  private readonly logger: Logger;

  public readonly entityType: EntityType;

  public constructor(
    private readonly backend: TrackingBackend,
    private readonly seed: IdentitySeed,
    options: { logger?: Logger } = {},
  ) {
    this.entityType = seed.entity?.type ?? 'shot';
    this.slots = {
      project: initialState(seed.project),
      entity: initialState(seed.entity),
      task: initialState(seed.task),
      artist: initialState(seed.artist),
    };
    this.logger = options.logger ?? createChildLogger({ module: 'IdentityResolver', backend: backend.kind });
  }

  public state(slot: IdentitySlotName): SlotState {
    return this.slots[slot];
  }

  public async fetchProjectId(): Promise<TrackingId | null> {
    return this.resolveSlot('project', this.seed.project?.name, (name) => this.backend.getProjectId(name));
  }

  public async fetchEntityId(): Promise<TrackingId | null> {
    const name = this.seed.entity?.name;
    if (!this.needsLookup('entity', name)) {
      return slotId(this.slots.entity);
    }

    const projectId = await this.fetchProjectId();
    return this.resolveSlot('entity', name, (entityName) =>
      this.backend.getEntityId(entityName, this.entityType, { projectId }),
    );
  }

  public async fetchTaskId(): Promise<TrackingId | null> {
    const name = this.seed.task?.name;
    if (!this.needsLookup('task', name)) {
      return slotId(this.slots.task);
    }

    const entityId = await this.fetchEntityId();
    if (entityId === null) {
      this.logger.debug({ task: name }, 'Task lookup needs an entity id');
      return null;
    }

    const projectId = slotId(this.slots.project);
    return this.resolveSlot('task', name, (taskName) =>
      this.backend.getTaskId(entityId, taskName, { projectId, entityType: this.entityType }),
    );
  }

  public async fetchArtistId(): Promise<TrackingId | null> {
    return this.resolveSlot('artist', this.seed.artist?.name, (name) => this.backend.getArtistId(name));
  }

  public async resolveAll(): Promise<ResolvedIdentity> {
    const projectId = await this.fetchProjectId();
    const entityId = await this.fetchEntityId();
    const taskId = await this.fetchTaskId();
    const artistId = await this.fetchArtistId();

    return {
      projectName: this.seed.project?.name ?? null,
      projectId,
      entityName: this.seed.entity?.name ?? null,
      entityType: this.entityType,
      entityId,
      taskName: this.seed.task?.name ?? null,
      taskId,
      artistName: this.seed.artist?.name ?? null,
      artistId,
    };
  }

  public describe(): Record<string, unknown> {
    return {
      backend: this.backend.kind,
      entityType: this.entityType,
      project: { name: this.seed.project?.name ?? null, state: this.slots.project.status },
      entity: { name: this.seed.entity?.name ?? null, state: this.slots.entity.status },
      task: { name: this.seed.task?.name ?? null, state: this.slots.task.status },
      artist: { name: this.seed.artist?.name ?? null, state: this.slots.artist.status },
    };
  }

  private needsLookup(slot: IdentitySlotName, name: string | undefined): name is string {
    return this.slots[slot].status === 'unresolved' && name !== undefined && name !== '';
  }

  private async resolveSlot(
    slot: IdentitySlotName,
    name: string | undefined,
    lookup: (name: string) => Promise<TrackingId | null>,
  ): Promise<TrackingId | null> {
    const state = this.slots[slot];
    if (state.status === 'present') {
      return state.id;
    }
    if (state.status === 'absent' || !name) {
      return null;
    }

    const inFlight = this.pending.get(slot);
    if (inFlight) {
      return inFlight;
    }

    const request = this.lookup(slot, name, lookup).finally(() => this.pending.delete(slot));
    this.pending.set(slot, request);
    return request;
  }

  private async lookup(
    slot: IdentitySlotName,
    name: string,
    lookup: (name: string) => Promise<TrackingId | null>,
  ): Promise<TrackingId | null> {
    try {
      const id = await lookup(name);
      this.slots[slot] = id === null ? { status: 'absent' } : { status: 'present', id };
      if (id === null) {
        this.logger.warn({ slot, name }, 'No match in tracking system');
      } else {
        this.logger.debug({ slot, name, id }, 'Identity resolved');
      }
      return id;
    } catch (error) {
      this.logger.error({ slot, name, error }, 'Identity lookup failed');
      return null;
    }
  }
}
