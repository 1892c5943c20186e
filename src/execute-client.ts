import axios, { AxiosInstance, AxiosResponse } from 'axios';
import SemanticReleaseError from '@semantic-release/error';
import { BODY_SNIPPET_MAX, ExecuteHttpError, truncate } from './errors.js';
import type { JsonValue, Query } from './query-builder.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface ExecuteClientOptions {
  /** Per-request timeout in milliseconds. Default 30000. */
  timeoutMs?: number;
  /**
   * Preconfigured axios instance, e.g. one with a test adapter. Headers,
   * timeout and status handling are set per request, so they apply to an
   * injected instance as well.
   */
  http?: AxiosInstance;
}

interface ExecuteBody {
  query: string;
  query_args?: Record<string, JsonValue>;
}

export interface ProbeResult {
  status: number;
  statusText: string;
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}

/**
 * HTTP transport for the edge server's execute endpoint. Every statement
 * is a POST of `{ query, query_args? }` to `<baseURL>/<appID>/execute`.
 *
 * Status handling is done here rather than by axios, so the raw body is
 * available for error excerpts. Transport failures (refused connections,
 * timeouts, aborts) are rethrown as axios raised them.
 */
export class ExecuteClient {
  private readonly baseURL: string;
  private readonly appID: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;

  constructor(baseURL: string, appID: string, opts: ExecuteClientOptions = {}) {
    this.baseURL = baseURL;
    this.appID = appID;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.http = opts.http ?? axios.create();
  }

  get url(): string {
    return `${this.baseURL.replace(/\/+$/, '')}/${this.appID}/execute`;
  }

  private post(
    query: Query,
    signal?: AbortSignal,
  ): Promise<AxiosResponse<unknown>> {
    const body: ExecuteBody = { query: query.query };
    if (query.args !== undefined) {
      body.query_args = query.args;
    }
    return this.http.post<unknown>(this.url, body, {
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
      },
      timeout: this.timeoutMs,
      signal,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  }

  /**
   * Post a statement and decode the JSON answer.
   *
   * @throws ExecuteHttpError on a non-2xx status.
   * @throws SemanticReleaseError `EINVALIDRESPONSE` when a 2xx body is not
   *   JSON.
   */
  async execute(query: Query, signal?: AbortSignal): Promise<JsonValue> {
    const res = await this.post(query, signal);
    const text = bodyText(res.data);

    if (res.status < 200 || res.status >= 300) {
      throw new ExecuteHttpError(res.status, text, query.query);
    }

    try {
      const out: JsonValue = JSON.parse(text);
      return out;
    } catch {
      throw new SemanticReleaseError(
        'Response body is not valid JSON.',
        'EINVALIDRESPONSE',
        truncate(text, BODY_SNIPPET_MAX),
      );
    }
  }

  /**
   * Post a statement and report only the HTTP status line. Any status,
   * including errors from the server, counts as a reachable endpoint.
   */
  async probe(query: Query, signal?: AbortSignal): Promise<ProbeResult> {
    const res = await this.post(query, signal);
    return { status: res.status, statusText: res.statusText };
  }
}
