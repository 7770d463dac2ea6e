import { Request, Response } from 'express';
import { DeploymentService } from '../services/deployment';
import { Logger } from '../utils/logger';

export class WebhookRoutes {
  private deploymentService: DeploymentService;
  private logger: Logger;

  constructor(deploymentService: DeploymentService, logger: Logger) {
    this.deploymentService = deploymentService;
    this.logger = logger;
  }

  /**
   * Handle `POST /webhook/{subpath}`
   */
  async handleWebhook(req: Request, res: Response): Promise<void> {
    try {
      const { statusCode, body } = await this.deploymentService.handleWebhook({
        subpath: req.params[0] ?? '',
        token: req.get('X-Security-Token'),
      });
      res.status(statusCode).json(body);
    } catch (error) {
      this.logger.error('Error processing webhook:', error);
      res.status(500).json({ status: 'error', message: 'Internal server error' });
    }
  }

  /**
   * Health check endpoint
   */
  healthCheck(req: Request, res: Response): void {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      restart: this.deploymentService.getRestartState(),
    });
  }
}
