import { open } from 'node:fs/promises';
import { RestartState } from '../types';
import { Logger } from '../utils/logger';

export interface ReloadTrigger {
  fire(): Promise<void>;
}

/**
 * Reload by touching a sentinel file the supervisor watches.
 */
export class TouchFileTrigger implements ReloadTrigger {
  constructor(readonly filePath: string) {}

  async fire(): Promise<void> {
    const now = new Date();
    const handle = await open(this.filePath, 'a');
    try {
      await handle.utimes(now, now);
    } finally {
      await handle.close();
    }
  }
}

/**
 * Level-triggered restart signal. Successful syncs raise it, the poll loop
 * lowers it and fires the reload trigger once per observed raise.
 */
export class RestartCoordinator {
  private state: RestartState = 'idle';
  private timer: NodeJS.Timeout | null = null;
  private firing = false;

  constructor(
    private trigger: ReloadTrigger,
    private logger: Logger,
    private intervalMs: number,
  ) {}

  getState(): RestartState {
    return this.state;
  }

  requestRestart(): void {
    this.state = 'restart-requested';
  }

  /**
   * Fire the trigger if a restart was requested since the last poll.
   * Resolves to whether it fired.
   */
  async poll(): Promise<boolean> {
    // Read and clear happen in one synchronous step; nothing can interleave
    if (this.state !== 'restart-requested') {
      return false;
    }
    this.state = 'idle';

    this.logger.info('Restart signal received');
    try {
      await this.trigger.fire();
      this.logger.info('Reload trigger fired');
    } catch (error) {
      this.logger.error('Failed to fire reload trigger:', error instanceof Error ? error.message : error);
    }
    return true;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      if (this.firing) {
        return;
      }
      this.firing = true;
      void this.poll()
        .catch((error: unknown) => this.logger.error('Restart poll failed:', error))
        .finally(() => {
          this.firing = false;
        });
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }
}
