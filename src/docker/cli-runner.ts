import SemanticReleaseError from '@semantic-release/error';
import { runHostCmd, type Logger } from '../command-runner.js';
import { errorMessage } from '../errors.js';
import type {
  ContainerOptions,
  ContainerRunner,
  ContainerState,
  Runner,
} from './runner.js';

export const DEFAULT_PORT_BINDING = '127.0.0.1:8090:8090';
export const CONFIG_MOUNT = '/config.yaml';
export const DATA_MOUNT = '/data';

/**
 * Classify the `{{.Status}}` column of `docker ps`. "Up 3 hours" is
 * running, "Exited (0) 2 minutes ago" is exited and no output means the
 * container does not exist. Other states come back lower-cased as-is.
 */
export function parseContainerStatus(output: string): ContainerState | string {
  const s = output.trim().toLowerCase();
  if (s.length === 0) return 'not-found';
  if (s.startsWith('up ')) return 'running';
  if (s.startsWith('exited ')) return 'exited';
  return s;
}

/**
 * Build the argv for a status lookup by exact container name. The filter
 * is anchored so "edge" does not also match "edge-2".
 */
export function buildStatusArgs(name: string): string[] {
  return ['ps', '-a', '--filter', `name=^/${name}$`, '--format', '{{.Status}}'];
}

/**
 * Build the argv for `docker run`. The container runs detached with the
 * API port published, the config file and data directory mounted, and the
 * server started against the mounted config.
 */
export function buildRunArgs(opts: ContainerOptions): string[] {
  return [
    'run',
    '-d',
    '--name',
    opts.containerName,
    '-p',
    opts.portBinding ?? DEFAULT_PORT_BINDING,
    '-v',
    `${opts.configPath}:${CONFIG_MOUNT}`,
    '-v',
    `${opts.dataPath}:${DATA_MOUNT}`,
    opts.imageName,
    'run',
    '-c',
    CONFIG_MOUNT,
  ];
}

/**
 * Runner that executes commands on the host through runHostCmd, echoing
 * them to the given logger.
 */
export function hostRunner(logger: Logger): Runner {
  return (cmd, args, signal) => runHostCmd(cmd, args, logger, signal);
}

export interface CliRunnerOptions {
  logger?: Logger;
  run?: Runner;
}

/**
 * A container runner backed by the plain Docker CLI. Commands are built
 * as argv arrays and handed to a configurable runner; the default one
 * executes them on the host.
 */
export class DockerCliRunner implements ContainerRunner {
  protected readonly runFn: Runner;
  protected readonly logger: Logger;

  constructor(opts: CliRunnerOptions = {}) {
    this.logger = opts.logger ?? console;
    this.runFn = opts.run ?? hostRunner(this.logger);
  }

  protected async imagePresent(
    imageName: string,
    signal?: AbortSignal,
  ): Promise<boolean> {
    try {
      await this.runFn('docker', ['image', 'inspect', imageName], signal);
      return true;
    } catch {
      return false;
    }
  }

  protected async loadImage(
    tarPath: string,
    signal?: AbortSignal,
  ): Promise<void> {
    try {
      await this.runFn('docker', ['load', '-i', tarPath], signal);
    } catch (e) {
      throw new SemanticReleaseError(
        `docker load: ${errorMessage(e)}`,
        'EIMAGELOADFAILED',
        `Could not load image tarball ${tarPath}.`,
      );
    }
  }

  /**
   * Inspect the image locally and load it from `tarPath` only when it is
   * missing. A missing image with no tarball is an error here, since plain
   * `docker run` would otherwise try a registry pull.
   */
  async ensureImageLoaded(
    imageName: string,
    tarPath?: string,
    signal?: AbortSignal,
  ): Promise<void> {
    if (await this.imagePresent(imageName, signal)) {
      this.logger.log(`ensureImageLoaded: image "${imageName}" present`);
      return;
    }
    if (!tarPath) {
      throw new SemanticReleaseError(
        `Image ${imageName} is not present locally.`,
        'EIMAGEMISSING',
        'Provide an image tarball path or load the image beforehand.',
      );
    }
    await this.loadImage(tarPath, signal);
  }

  async containerStatus(
    name: string,
    signal?: AbortSignal,
  ): Promise<ContainerState | string> {
    const out = await this.runFn('docker', buildStatusArgs(name), signal);
    return parseContainerStatus(out);
  }

  /**
   * Recreate the container: any previous container with the same name is
   * force-removed first so new mounts and config take effect.
   */
  async runContainer(
    opts: ContainerOptions,
    signal?: AbortSignal,
  ): Promise<void> {
    try {
      await this.runFn('docker', ['rm', '-f', opts.containerName], signal);
    } catch (e) {
      this.logger.log(
        `runContainer: nothing to remove for "${opts.containerName}" ` +
          `(${errorMessage(e)})`,
      );
    }
    await this.runFn('docker', buildRunArgs(opts), signal);
  }

  async startContainer(name: string, signal?: AbortSignal): Promise<void> {
    await this.runFn('docker', ['start', name], signal);
  }

  async stopContainer(name: string, signal?: AbortSignal): Promise<void> {
    await this.runFn('docker', ['stop', name], signal);
  }
}
