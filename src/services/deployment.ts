import { realpath, stat } from 'node:fs/promises';
import { RepositorySynchronizer, ServerConfiguration, WebhookRequest, WebhookResponse } from '../types';
import { Logger } from '../utils/logger';
import { PathValidator } from '../utils/path';
import { authorize } from '../utils/webhook';
import { RestartCoordinator } from './restart';

const MISSING_CODES = ['ENOENT', 'ENOTDIR', 'ELOOP'];

function failure(statusCode: number, message: string): WebhookResponse {
  return { statusCode, body: { status: 'error', message } };
}

export class DeploymentService {
  private config: ServerConfiguration;
  private pathValidator: PathValidator;
  private synchronizer: RepositorySynchronizer;
  private restartCoordinator: RestartCoordinator;
  private logger: Logger;

  constructor(
    config: ServerConfiguration,
    synchronizer: RepositorySynchronizer,
    restartCoordinator: RestartCoordinator,
    logger: Logger,
  ) {
    this.config = config;
    this.pathValidator = new PathValidator(config.repositoryRoot);
    this.synchronizer = synchronizer;
    this.restartCoordinator = restartCoordinator;
    this.logger = logger;
  }

  /**
   * Authenticate, locate and synchronize the repository named by a webhook,
   * then request a reload. Every outcome is a response; nothing throws for
   * bad input or a failed sync.
   */
  async handleWebhook(request: WebhookRequest): Promise<WebhookResponse> {
    if (this.config.debug && this.config.securityToken !== undefined) {
      this.logger.debug(`Received token: ${request.token ?? '<none>'}`);
    }

    if (!authorize(request.token, this.config.securityToken)) {
      this.logger.warn('Unauthorized access attempt');
      return failure(401, 'Unauthorized');
    }

    const repoPath = this.pathValidator.resolve(request.subpath);
    if (repoPath === null) {
      this.logger.error(`Invalid repository path: ${request.subpath}`);
      return failure(400, 'Invalid repository path');
    }

    this.logger.info(`Processing webhook for: ${repoPath}`);

    if (!(await this.isDirectory(repoPath))) {
      this.logger.error(`Repository directory not found: ${repoPath}`);
      return failure(404, 'Repository not found');
    }

    // A symlink inside the root may still point elsewhere
    const canonicalPath = await realpath(repoPath);
    if (!this.pathValidator.contains(canonicalPath)) {
      this.logger.error(`Repository path escapes root: ${repoPath} -> ${canonicalPath}`);
      return failure(400, 'Invalid repository path');
    }

    const result = await this.synchronizer.synchronize(canonicalPath);
    if (!result.success) {
      const message = `Git operation failed: ${result.message}`;
      this.logger.error(message);
      return failure(500, message);
    }

    this.restartCoordinator.requestRestart();
    this.logger.info(`✅ Updated ${canonicalPath}`);
    return { statusCode: 200, body: { status: 'success', message: 'Repository updated' } };
  }

  getRestartState() {
    return this.restartCoordinator.getState();
  }

  private async isDirectory(target: string): Promise<boolean> {
    try {
      return (await stat(target)).isDirectory();
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && MISSING_CODES.includes(String(error.code))) {
        return false;
      }
      throw error;
    }
  }
}
