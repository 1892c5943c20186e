import { errorMessage } from '../errors.js';
import { DockerCliRunner } from './cli-runner.js';
import type { ContainerOptions } from './runner.js';

export const DEFAULT_COMPOSE_SERVICE = 'ditto-edge-server';

/**
 * Build the argv for `docker compose up -d <service>`, scoped to a compose
 * file when one is configured.
 */
export function buildComposeUpArgs(opts: ContainerOptions): string[] {
  const args = ['compose'];
  if (opts.composeFile) {
    args.push('-f', opts.composeFile);
  }
  args.push('up', '-d', opts.composeService ?? DEFAULT_COMPOSE_SERVICE);
  return args;
}

/**
 * A container runner that drives the server through Docker Compose. Image
 * checks and status lookups are shared with the plain CLI runner; the
 * status lookup uses the container name, which should match
 * `container_name` in the compose file.
 */
export class DockerComposeRunner extends DockerCliRunner {
  /**
   * Same inspect-then-load logic as the plain runner, except that a
   * missing image with no tarball is left for compose to pull or build.
   */
  override async ensureImageLoaded(
    imageName: string,
    tarPath?: string,
    signal?: AbortSignal,
  ): Promise<void> {
    if (await this.imagePresent(imageName, signal)) {
      this.logger.log(`ensureImageLoaded: image "${imageName}" present`);
      return;
    }
    if (!tarPath) {
      this.logger.log(
        `ensureImageLoaded: image "${imageName}" missing; ` +
          'deferring to compose pull/build',
      );
      return;
    }
    await this.loadImage(tarPath, signal);
  }

  override async runContainer(
    opts: ContainerOptions,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.runFn('docker', buildComposeUpArgs(opts), signal);
  }

  override async startContainer(
    name: string,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.runFn('docker', ['compose', 'start', name], signal);
  }

  /**
   * Stop through compose, then stop and force-remove any container left
   * behind under the same name. Every step is best-effort and failures
   * are only logged, so this always resolves.
   */
  override async stopContainer(
    name: string,
    signal?: AbortSignal,
  ): Promise<void> {
    const steps = [
      ['compose', 'stop', name],
      ['stop', name],
      ['rm', '-f', name],
    ];
    for (const args of steps) {
      try {
        await this.runFn('docker', args, signal);
      } catch (e) {
        this.logger.log(
          `stopContainer: ignoring failed "docker ${args.join(' ')}" ` +
            `(${errorMessage(e)})`,
        );
      }
    }
  }
}
