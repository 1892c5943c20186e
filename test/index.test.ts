import { describe, it, expect } from '@jest/globals';
import { DockerCliRunner } from '../src/docker/cli-runner.js';
import { createService } from '../src/index.js';
import { fakeHttp, ok } from './utils/fake-http.js';
import { silentLogger } from './utils/logger.js';
import { recorder } from './utils/recorder.js';
import { withEnv } from './utils/withenv.js';

describe('createService', () => {
  it('wires config into the HTTP client', async () => {
    const { http, seen } = fakeHttp(ok({ items: [] }));
    const service = createService(
      { baseURL: 'http://edge:8090/', appID: 'app1', timeoutMs: 2500 },
      { http, logger: silentLogger },
    );

    await service.getRecords('users', { limit: 2 });

    expect(seen).toEqual([
      {
        method: 'post',
        url: 'http://edge:8090/app1/execute',
        body: { query: 'SELECT * FROM users LIMIT 2' },
        timeout: 2500,
        accept: 'application/json',
      },
    ]);
    await expect(service.status()).resolves.toMatchObject({
      container: 'disabled',
    });
  });

  it('attaches the injected runner when a container block is present', async () => {
    const { calls, run } = recorder((line) =>
      line.startsWith('docker ps') ? '' : 'ok',
    );
    const { http } = fakeHttp(ok({}));
    const service = createService(
      {
        appID: 'app1',
        container: {
          containerName: 'edge',
          imageName: 'dittoedge/server:test',
          configPath: '/etc/edge/config.yaml',
          dataPath: '/var/lib/edge',
        },
      },
      {
        http,
        logger: silentLogger,
        runner: new DockerCliRunner({ run, logger: silentLogger }),
      },
    );

    await service.initDB();

    expect(calls).toEqual([
      'docker image inspect dittoedge/server:test',
      'docker ps -a --filter name=^/edge$ --format {{.Status}}',
      'docker rm -f edge',
      'docker run -d --name edge -p 127.0.0.1:8090:8090 ' +
        '-v /etc/edge/config.yaml:/config.yaml -v /var/lib/edge:/data ' +
        'dittoedge/server:test run -c /config.yaml',
    ]);
    expect(service.startedContainer).toBe(true);
  });

  it('fails fast without an app id', () => {
    withEnv({ EDGE_APP_ID: undefined }, () => {
      expect(() => createService({}, { logger: silentLogger })).toThrow(
        expect.objectContaining({ code: 'EMISSINGAPPID' }),
      );
    });
  });
});
