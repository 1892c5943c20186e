/**
 * Coarse container states the runners report. Any other state from the
 * engine is passed through as its lower-cased raw status text.
 */
export type ContainerState = 'running' | 'exited' | 'not-found';

/**
 * A function that executes a host command and resolves with its trimmed
 * output, rejecting when the command fails. Runners take one so tests can
 * record the argv instead of touching Docker.
 */
export interface Runner {
  (cmd: string, args: string[], signal?: AbortSignal): Promise<string>;
}

/**
 * Parameters for starting the edge server container. The compose fields
 * only matter to the compose-backed runner.
 */
export interface ContainerOptions {
  containerName: string;
  imageName: string;
  /** Tarball to `docker load` when the image is not present locally. */
  imageTarPath?: string;
  /** Host path mounted as the server's /config.yaml. */
  configPath: string;
  /** Host path mounted as the server's /data directory. */
  dataPath: string;
  /** Compose file passed with -f; compose discovers its own when unset. */
  composeFile?: string;
  /** Compose service to bring up. Default "ditto-edge-server". */
  composeService?: string;
  /** Port publish spec for `docker run -p`. Default "127.0.0.1:8090:8090". */
  portBinding?: string;
}

/**
 * Lifecycle operations for the container backing the edge server. The
 * service only calls these during init and shutdown, never per request.
 */
export interface ContainerRunner {
  /**
   * Make sure the image exists locally, loading it from a tarball when it
   * is missing and a path is given.
   */
  ensureImageLoaded(
    imageName: string,
    tarPath?: string,
    signal?: AbortSignal,
  ): Promise<void>;

  containerStatus(
    name: string,
    signal?: AbortSignal,
  ): Promise<ContainerState | string>;

  /** Create (or recreate) and start the container. */
  runContainer(opts: ContainerOptions, signal?: AbortSignal): Promise<void>;

  startContainer(name: string, signal?: AbortSignal): Promise<void>;

  stopContainer(name: string, signal?: AbortSignal): Promise<void>;
}
