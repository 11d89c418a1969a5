import type { z } from 'zod';

import { TrackingErrors } from '../../../domain/tracking/index.js';
import { createChildLogger, type Logger } from '../../../shared/logger/pino.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpRequest {
  readonly method: 'GET' | 'POST' | 'PUT';
  readonly path: string;
  readonly query?: Readonly<Record<string, string>>;
  /** Serialised as JSON unless it already is a body fetch understands. */
  readonly body?: unknown;
  readonly headers?: Readonly<Record<string, string>>;
}

export interface JsonHttpClientOptions {
  readonly fetch?: FetchLike;
  readonly logger?: Logger;
}

function isRawBody(body: unknown): body is FormData | URLSearchParams {
  return body instanceof FormData || body instanceof URLSearchParams;
}

/**
 * Thin JSON-over-HTTP helper shared by the tracking backends. Every response
 * is validated against a zod schema; transport and protocol failures become
 * `tracking.request-failed`.
 */
export class JsonHttpClient {
  private readonly fetchImpl: FetchLike;

  private readonly logger: Logger;

  private bearer: string | null = null;

  public constructor(
    private readonly backend: string,
    private readonly baseUrl: string,
    options: JsonHttpClientOptions = {},
  ) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? createChildLogger({ module: 'JsonHttpClient', backend });
  }

  public setBearer(token: string): void {
    this.bearer = token;
  }

  public url(path: string, query?: Readonly<Record<string, string>>): string {
    const url = new URL(path.replace(/^\//, ''), this.baseUrl.endsWith('/') ? this.baseUrl : `${this.baseUrl}/`);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  public async request<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, request: HttpRequest): Promise<T> {
    const url = this.url(request.path, request.query);
    const headers: Record<string, string> = { Accept: 'application/json', ...request.headers };
    if (this.bearer) {
      headers.Authorization = `Bearer ${this.bearer}`;
    }

    let body: RequestInit['body'];
    if (isRawBody(request.body)) {
      body = request.body;
    } else if (request.body !== undefined) {
      body = JSON.stringify(request.body);
      headers['Content-Type'] ??= 'application/json';
    }

    this.logger.debug({ method: request.method, url }, 'Tracking request');

    let response: Response;
    try {
      response = await this.fetchImpl(url, { method: request.method, headers, body });
    } catch (error) {
      throw TrackingErrors.requestFailed(this.backend, { method: request.method, url }, error);
    }

    const text = await response.text();
    if (!response.ok) {
      throw TrackingErrors.requestFailed(this.backend, {
        method: request.method,
        url,
        status: response.status,
        body: text,
      });
    }

    let payload: unknown;
    try {
      payload = text === '' ? null : JSON.parse(text);
    } catch (error) {
      throw TrackingErrors.requestFailed(
        this.backend,
        { method: request.method, url, status: response.status, body: text },
        error,
      );
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw TrackingErrors.requestFailed(
        this.backend,
        { method: request.method, url, status: response.status, body: text },
        parsed.error,
      );
    }

    return parsed.data;
  }
}
