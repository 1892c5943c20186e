import * as fs from 'fs';
import SemanticReleaseError from '@semantic-release/error';
import * as yaml from 'yaml';
import { z } from 'zod';
import type { ContainerOptions } from './docker/runner.js';
import { DEFAULT_PROBE_COLLECTION } from './edge-service.js';
import { errorMessage } from './errors.js';
import { DEFAULT_TIMEOUT_MS } from './execute-client.js';

// YAML writes an empty value as null; it reads the same as an absent key.
const optionalText = () =>
  z
    .string({ invalid_type_error: 'must be a string' })
    .nullish()
    .transform((v) => v ?? undefined);

const requiredText = () =>
  z
    .string({
      required_error: 'is required',
      invalid_type_error: 'must be a string',
    })
    .min(1, 'is required');

const ContainerModeSchema = z.enum(['docker', 'compose'], {
  errorMap: () => ({ message: 'must be "docker" or "compose"' }),
});

export const ContainerConfigSchema = z.object(
  {
    /**
     * Which CLI manages the container: plain `docker` or `docker compose`.
     * Default `"docker"`.
     */
    mode: ContainerModeSchema.nullish().transform((v) => v ?? undefined),
    containerName: requiredText(),
    imageName: requiredText(),
    imageTarPath: optionalText(),
    configPath: requiredText(),
    dataPath: requiredText(),
    composeFile: optionalText(),
    composeService: optionalText(),
    portBinding: optionalText(),
  },
  { invalid_type_error: 'must be a mapping' },
);

export const EdgeClientConfigSchema = z.object(
  {
    /**
     * Base URL of the edge server's HTTP API. When omitted, falls back to
     * the `EDGE_BASE_URL` environment variable, then to
     * `"http://localhost:8090"`.
     */
    baseURL: optionalText(),

    /**
     * Application (database) identifier used in the execute path. When
     * omitted, falls back to the `EDGE_APP_ID` environment variable.
     */
    appID: optionalText(),

    /** HTTP timeout in milliseconds. Default is `30000`. */
    timeoutMs: z
      .number({ invalid_type_error: 'must be a number' })
      .nullish()
      .transform((v) => v ?? undefined),

    /** Collection queried by the status probe. Default is `"chat"`. */
    probeCollection: optionalText(),

    /**
     * Container management block. When omitted, `initDB` and `close` do
     * nothing and the server is expected to be running.
     */
    container: ContainerConfigSchema.nullish().transform((v) => v ?? undefined),
  },
  { invalid_type_error: 'configuration must be a mapping' },
);

export type ContainerMode = z.infer<typeof ContainerModeSchema>;
export type ContainerConfig = z.infer<typeof ContainerConfigSchema>;
export type EdgeClientConfig = z.infer<typeof EdgeClientConfigSchema>;

export const DEFAULT_BASE_URL = 'http://localhost:8090';

function invalid(message: string): SemanticReleaseError {
  return new SemanticReleaseError(
    message,
    'EINVALIDCONFIG',
    'Check the edge client configuration file.',
  );
}

/**
 * Check a parsed document against EdgeClientConfigSchema. Unknown keys are
 * dropped; known keys of the wrong type are rejected. The first problem
 * becomes the error message, e.g. `config.container.imageName is required`.
 *
 * @param raw Parsed YAML or JSON.
 * @throws SemanticReleaseError `EINVALIDCONFIG`.
 */
export function parseConfig(raw: unknown): EdgeClientConfig {
  const parsed = EdgeClientConfigSchema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }
  const [issue] = parsed.error.issues;
  if (!issue) {
    throw invalid('configuration is invalid');
  }
  if (issue.path.length === 0) {
    throw invalid(issue.message);
  }
  throw invalid(`config.${issue.path.join('.')} ${issue.message}`);
}

/**
 * Read and validate a YAML configuration file. JSON files parse as well,
 * since JSON is a subset of YAML.
 */
export function loadConfigFile(filePath: string): EdgeClientConfig {
  let doc: unknown;
  try {
    doc = yaml.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err: unknown) {
    throw invalid(`cannot read ${filePath}: ${errorMessage(err)}`);
  }
  return parseConfig(doc);
}

/**
 * EdgeConfig wraps the raw client config and exposes derived values
 * and safe defaults, so construction code reads options in one place.
 */
export class EdgeConfig {
  private readonly cfg: EdgeClientConfig;

  constructor(cfg: EdgeClientConfig) {
    this.cfg = cfg;
  }

  /**
   * Base URL, falling back to `EDGE_BASE_URL` and then the local default.
   */
  getBaseURL(): string {
    return this.cfg.baseURL ?? process.env.EDGE_BASE_URL ?? DEFAULT_BASE_URL;
  }

  /**
   * Application identifier, falling back to `EDGE_APP_ID`.
   *
   * @throws SemanticReleaseError `EMISSINGAPPID` when neither is set.
   */
  getAppID(): string {
    const id = this.cfg.appID ?? process.env.EDGE_APP_ID;
    if (!id) {
      throw new SemanticReleaseError(
        'Missing application id.',
        'EMISSINGAPPID',
        'Set appID in the configuration or EDGE_APP_ID in the environment.',
      );
    }
    return id;
  }

  /**
   * @throws SemanticReleaseError `EINVALIDTIMEOUT` for a non-positive or
   *   non-finite value.
   */
  getTimeoutMs(): number {
    const t = this.cfg.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isFinite(t) || t <= 0) {
      throw new SemanticReleaseError(
        `Invalid timeout: ${t}`,
        'EINVALIDTIMEOUT',
        'timeoutMs must be a positive number of milliseconds.',
      );
    }
    return t;
  }

  getProbeCollection(): string {
    return this.cfg.probeCollection ?? DEFAULT_PROBE_COLLECTION;
  }

  isContainerEnabled(): boolean {
    return this.cfg.container !== undefined;
  }

  getContainerMode(): ContainerMode {
    return this.cfg.container?.mode ?? 'docker';
  }

  /**
   * Container options without the mode selector, or `undefined` when
   * container management is off.
   */
  getContainerOptions(): ContainerOptions | undefined {
    const c = this.cfg.container;
    if (!c) return undefined;
    return {
      containerName: c.containerName,
      imageName: c.imageName,
      imageTarPath: c.imageTarPath,
      configPath: c.configPath,
      dataPath: c.dataPath,
      composeFile: c.composeFile,
      composeService: c.composeService,
      portBinding: c.portBinding,
    };
  }
}
