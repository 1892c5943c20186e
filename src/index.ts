import type { AxiosInstance } from 'axios';
import type { Logger } from './command-runner.js';
import { EdgeConfig, type EdgeClientConfig } from './client-config.js';
import { DockerCliRunner } from './docker/cli-runner.js';
import { DockerComposeRunner } from './docker/compose-runner.js';
import type { ContainerRunner } from './docker/runner.js';
import { EdgeService } from './edge-service.js';

export * from './client-config.js';
export * from './command-runner.js';
export * from './docker/cli-runner.js';
export * from './docker/compose-runner.js';
export * from './docker/runner.js';
export * from './edge-service.js';
export * from './errors.js';
export * from './execute-client.js';
export * from './query-builder.js';

export interface ServiceDeps {
  logger?: Logger;
  http?: AxiosInstance;
  /** Overrides the runner the container mode would select. */
  runner?: ContainerRunner;
}

/**
 * Build an EdgeService from configuration. When the config carries a
 * container block, a runner is attached: the injected one if given,
 * otherwise a plain Docker or Docker Compose runner according to
 * `container.mode`.
 *
 * @param config Client configuration, e.g. from loadConfigFile.
 * @param deps Logger, HTTP instance and runner overrides.
 * @throws SemanticReleaseError when the config is incomplete.
 */
export function createService(
  config: EdgeClientConfig,
  deps: ServiceDeps = {},
): EdgeService {
  const cfg = new EdgeConfig(config);
  const logger = deps.logger ?? console;

  const service = new EdgeService(cfg.getBaseURL(), cfg.getAppID(), {
    timeoutMs: cfg.getTimeoutMs(),
    probeCollection: cfg.getProbeCollection(),
    logger,
    http: deps.http,
  });

  const options = cfg.getContainerOptions();
  if (options) {
    const runner =
      deps.runner ??
      (cfg.getContainerMode() === 'compose'
        ? new DockerComposeRunner({ logger })
        : new DockerCliRunner({ logger }));
    service.withContainer(runner, options);
  }

  return service;
}

// noinspection JSUnusedGlobalSymbols
export default { createService };
