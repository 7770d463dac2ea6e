import path from 'node:path';
import { RunningServer, startServer } from './server';
import { createRepositoryRoot, createTestConfig, createTestLogger, removeTemporaryDirectories } from './test-helpers';
import { SyncResult } from './types';

describe('startServer', () => {
  let running: RunningServer | undefined;

  afterEach(async () => {
    await running?.close();
    running = undefined;
    removeTemporaryDirectories();
  });

  it('serves webhooks and runs the restart loop until closed', async () => {
    const root = createRepositoryRoot('blog');
    const logger = createTestLogger();
    const synchronize = jest.fn<Promise<SyncResult>, [string]>().mockResolvedValue({ success: true, message: '' });

    running = await startServer(createTestConfig({ repositoryRoot: root }), { logger, synchronizer: { synchronize } });
    const address = running.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }

    const response = await fetch(`http://127.0.0.1:${address.port}/webhook/blog`, {
      method: 'POST',
      headers: { 'X-Security-Token': 'abc123' },
    });

    expect(response.status).toBe(200);
    expect(synchronize).toHaveBeenCalledWith(path.join(root, 'blog'));
    expect(running.restartCoordinator.isRunning()).toBe(true);

    const { restartCoordinator } = running;
    await running.close();
    running = undefined;
    expect(restartCoordinator.isRunning()).toBe(false);
  });

  it('warns when authentication is disabled', async () => {
    const logger = createTestLogger();

    running = await startServer(
      createTestConfig({ repositoryRoot: createRepositoryRoot(), securityToken: undefined }),
      { logger, synchronizer: { synchronize: jest.fn() } },
    );

    expect(logger.warn).toHaveBeenCalledWith('⚠️  No security token configured: webhook authentication is disabled');
  });
});
