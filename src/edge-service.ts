import type { AxiosInstance } from 'axios';
import type { Logger } from './command-runner.js';
import type { ContainerOptions, ContainerRunner } from './docker/runner.js';
import { errorMessage, wrapError } from './errors.js';
import { ExecuteClient } from './execute-client.js';
import {
  buildDeleteAll,
  buildDeleteRecord,
  buildGetRecord,
  buildInsert,
  buildSelect,
  buildUpdate,
  type JsonObject,
  type JsonValue,
  type Query,
  type SelectOptions,
} from './query-builder.js';

export const DEFAULT_PROBE_COLLECTION = 'chat';

export interface EdgeServiceOptions {
  timeoutMs?: number;
  /** Collection targeted by the status probe. Default "chat". */
  probeCollection?: string;
  logger?: Logger;
  http?: AxiosInstance;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * Diagnostic snapshot returned by `status()`. Failures of the container
 * lookup or the HTTP probe are reported in the `*Error` fields instead of
 * being thrown.
 */
export interface ServiceStatus {
  baseURL: string;
  appID: string;
  /** Container state, or "disabled" when no runner is attached. */
  container?: string;
  containerError?: string;
  /** True once initDB has run the container in this process. */
  containerStarted: boolean;
  /** HTTP status line of the probe, or "unreachable". */
  http: string;
  httpError?: string;
}

async function stage<T>(name: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    throw wrapError(name, err, 'EINITFAILED');
  }
}

/**
 * Client for a Ditto Edge server's HTTP API. Each CRUD method builds a DQL
 * statement (parameterized wherever it carries user data) and posts it to
 * the execute endpoint, resolving with the decoded JSON answer.
 *
 * A ContainerRunner can be attached with `withContainer` so that `initDB`
 * and `close` also manage the server's container. Without one, both are
 * no-ops and the server is assumed to be running already.
 */
export class EdgeService {
  readonly baseURL: string;
  readonly appID: string;
  private readonly client: ExecuteClient;
  private readonly logger: Logger;
  private readonly probeCollection: string;
  private container?: { runner: ContainerRunner; options: ContainerOptions };
  private started = false;

  constructor(baseURL: string, appID: string, opts: EdgeServiceOptions = {}) {
    this.baseURL = baseURL;
    this.appID = appID;
    this.logger = opts.logger ?? console;
    this.probeCollection = opts.probeCollection ?? DEFAULT_PROBE_COLLECTION;
    this.client = new ExecuteClient(baseURL, appID, {
      timeoutMs: opts.timeoutMs,
      http: opts.http,
    });
  }

  /**
   * Attach (or, with `undefined`, detach) the runner that manages the
   * server container, together with the options used to run it.
   */
  withContainer(
    runner: ContainerRunner | undefined,
    options: ContainerOptions,
  ): this {
    this.container = runner ? { runner, options } : undefined;
    return this;
  }

  /** Whether initDB ran the container during this process. */
  get startedContainer(): boolean {
    return this.started;
  }

  /**
   * Make sure the server container is up. The image is loaded if needed,
   * then the container's state decides what happens: a running container
   * is left alone; anything else (exited, missing, created, ...) is run
   * again so mount and config changes are picked up.
   *
   * @throws SemanticReleaseError prefixed with the failing stage.
   */
  async initDB(opts: RequestOptions = {}): Promise<void> {
    if (!this.container) {
      this.logger.log('initDB: container management disabled');
      return;
    }
    const { runner, options } = this.container;
    const { signal } = opts;

    await stage('ensure image', () =>
      runner.ensureImageLoaded(options.imageName, options.imageTarPath, signal),
    );
    const status = await stage('container status', () =>
      runner.containerStatus(options.containerName, signal),
    );
    this.logger.log(`initDB: container "${options.containerName}" ${status}`);

    if (status === 'running') {
      return;
    }

    await stage('run container', () => runner.runContainer(options, signal));
    this.started = true;
    this.logger.log(`initDB: container "${options.containerName}" started`);
  }

  /**
   * Best-effort stop of the managed container. Never rejects, and can be
   * called any number of times.
   */
  async close(opts: RequestOptions = {}): Promise<void> {
    if (!this.container) {
      return;
    }
    const { runner, options } = this.container;
    try {
      await runner.stopContainer(options.containerName, opts.signal);
      this.logger.log(`close: container "${options.containerName}" stopped`);
    } catch (err: unknown) {
      this.logger.log(`close: ignoring stop failure (${errorMessage(err)})`);
    }
  }

  /**
   * Report connection settings, the container state and the outcome of a
   * one-row SELECT against the server.
   */
  async status(opts: RequestOptions = {}): Promise<ServiceStatus> {
    const res: ServiceStatus = {
      baseURL: this.baseURL,
      appID: this.appID,
      containerStarted: this.started,
      http: 'unreachable',
    };

    if (this.container) {
      const { runner, options } = this.container;
      try {
        res.container = await runner.containerStatus(
          options.containerName,
          opts.signal,
        );
      } catch (err: unknown) {
        res.containerError = errorMessage(err);
      }
    } else {
      res.container = 'disabled';
    }

    const probe: Query = {
      query: buildSelect(this.probeCollection, {}, { limit: 1 }),
    };
    try {
      const { status, statusText } = await this.client.probe(
        probe,
        opts.signal,
      );
      res.http = statusText ? `${status} ${statusText}` : String(status);
    } catch (err: unknown) {
      res.httpError = errorMessage(err);
    }

    return res;
  }

  /** Post a prebuilt statement. */
  async execute(query: Query, opts: RequestOptions = {}): Promise<JsonValue> {
    return this.client.execute(query, opts.signal);
  }

  async createDocument(
    collection: string,
    doc: JsonObject,
    opts: RequestOptions = {},
  ): Promise<JsonValue> {
    return this.execute(buildInsert(collection, doc), opts);
  }

  async getRecord(
    collection: string,
    id: string,
    opts: RequestOptions = {},
  ): Promise<JsonValue> {
    return this.execute(buildGetRecord(collection, id), opts);
  }

  async getRecords(
    collection: string,
    select: SelectOptions = {},
    opts: RequestOptions = {},
  ): Promise<JsonValue> {
    return this.execute({ query: buildSelect(collection, {}, select) }, opts);
  }

  async updateRecord(
    collection: string,
    id: string,
    patch: JsonObject,
    opts: RequestOptions = {},
  ): Promise<JsonValue> {
    return this.execute(buildUpdate(collection, id, patch), opts);
  }

  async deleteRecord(
    collection: string,
    id: string,
    opts: RequestOptions = {},
  ): Promise<JsonValue> {
    return this.execute(buildDeleteRecord(collection, id), opts);
  }

  async deleteAllRecords(
    collection: string,
    opts: RequestOptions = {},
  ): Promise<JsonValue> {
    return this.execute(buildDeleteAll(collection), opts);
  }

  /** Newest record by `sortBy`, i.e. a descending one-row SELECT. */
  async latestRecord(
    collection: string,
    sortBy: string,
    opts: RequestOptions = {},
  ): Promise<JsonValue> {
    return this.getRecords(
      collection,
      { limit: 1, sortBy, sortOrder: 'DESC' },
      opts,
    );
  }

  async search(
    collection: string,
    filters: Record<string, string>,
    select: SelectOptions = {},
    opts: RequestOptions = {},
  ): Promise<JsonValue> {
    return this.execute(
      { query: buildSelect(collection, filters, select) },
      opts,
    );
  }
}
