import {
  isTrackingBackendKind,
  TRACKING_BACKEND_KINDS,
  TrackingErrors,
  type TrackingBackend,
  type TrackingBackendKind,
} from '../../domain/tracking/index.js';

import { FlowTrackingBackend } from './flow-tracking-backend.js';
import { FtrackTrackingBackend } from './ftrack-tracking-backend.js';
import type { FetchLike } from './http/json-http-client.js';
import { KitsuTrackingBackend } from './kitsu-tracking-backend.js';
import { ShotgunTrackingBackend } from './shotgun-tracking-backend.js';

export interface TrackingConnection {
  readonly url?: string;
  readonly login?: string;
  /** Password, API key or token depending on the backend. */
  readonly password?: string;
  readonly fetch?: FetchLike;
}

interface ResolvedConnection {
  readonly url: string;
  readonly login: string;
  readonly password: string;
  readonly fetch?: FetchLike;
}

type Setting = 'url' | 'login' | 'password';

const SETTING_NAMES: Readonly<Record<Setting, string>> = {
  url: 'TRACKING_URL',
  login: 'TRACKING_LOGIN',
  password: 'TRACKING_PASSWORD',
};

interface BackendFactory {
  readonly settings: readonly Setting[];
  readonly create: (connection: ResolvedConnection) => TrackingBackend;
}

const FACTORIES: Readonly<Record<TrackingBackendKind, BackendFactory>> = {
  shotgun: {
    settings: ['url', 'login', 'password'],
    create: (connection) => new ShotgunTrackingBackend(connection),
  },
  ftrack: {
    settings: ['url', 'login', 'password'],
    create: ({ url, login, password, fetch }) => new FtrackTrackingBackend({ url, login, apiKey: password, fetch }),
  },
  kitsu: {
    settings: ['url', 'login', 'password'],
    create: (connection) => new KitsuTrackingBackend(connection),
  },
  flow: {
    settings: ['url', 'password'],
    create: ({ url, password, fetch }) => new FlowTrackingBackend({ url, token: password, fetch }),
  },
};

function requireConnection(
  kind: TrackingBackendKind,
  settings: readonly Setting[],
  connection: TrackingConnection,
): ResolvedConnection {
  const missing = settings.filter((setting) => !connection[setting]).map((setting) => SETTING_NAMES[setting]);
  if (missing.length > 0) {
    throw TrackingErrors.notConfigured(kind, missing);
  }

  return {
    url: connection.url ?? '',
    login: connection.login ?? '',
    password: connection.password ?? '',
    fetch: connection.fetch,
  };
}

/** Builds the tracking backend named by a lowercase identifier such as `shotgun`. */
export function createTrackingBackend(name: string, connection: TrackingConnection): TrackingBackend {
  const kind = name.toLowerCase();
  if (!isTrackingBackendKind(kind)) {
    throw TrackingErrors.unknownBackend(name, TRACKING_BACKEND_KINDS);
  }

  const factory = FACTORIES[kind];
  return factory.create(requireConnection(kind, factory.settings, connection));
}
