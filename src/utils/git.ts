import { execFile } from 'node:child_process';
import { promisify } from 'util';
import { RepositorySynchronizer, SyncResult } from '../types';
import { Logger } from './logger';

const execFileAsync = promisify(execFile);

export interface GitCommandOptions {
  cwd: string;
  timeout: number;
}

export type GitRunner = (args: string[], options: GitCommandOptions) => Promise<{ stdout: string; stderr: string }>;

export const runGit: GitRunner = async (args, options) => {
  const { stdout, stderr } = await execFileAsync('git', args, {
    cwd: options.cwd,
    timeout: options.timeout,
    encoding: 'utf8',
  });
  return { stdout, stderr };
};

/**
 * Diagnostic text for a failed git invocation: stderr when git wrote any,
 * otherwise the error message (spawn failures, timeouts).
 */
export function describeGitError(error: unknown): string {
  if (typeof error === 'object' && error !== null) {
    if ('stderr' in error && typeof error.stderr === 'string' && error.stderr.trim()) {
      return error.stderr.trim();
    }
    if ('killed' in error && error.killed === true) {
      return 'git command timed out';
    }
  }
  if (error instanceof Error) {
    return error.message;
  }
  return 'Unknown error';
}

export class GitManager implements RepositorySynchronizer {
  private timeoutMs: number;
  private logger: Logger;
  private run: GitRunner;
  private pending = new Map<string, Promise<SyncResult>>();

  constructor(timeoutMs: number, logger: Logger, run: GitRunner = runGit) {
    this.timeoutMs = timeoutMs;
    this.logger = logger;
    this.run = run;
  }

  /**
   * Discard local changes and untracked files, then fast-forward to the
   * upstream branch. Calls for the same directory run one after another.
   */
  synchronize(directory: string): Promise<SyncResult> {
    const previous = this.pending.get(directory) ?? Promise.resolve<SyncResult>({ success: true, message: '' });
    const current = previous.then(() => this.pullLatestChanges(directory));

    this.pending.set(directory, current);
    return current.finally(() => {
      if (this.pending.get(directory) === current) {
        this.pending.delete(directory);
      }
    });
  }

  private async pullLatestChanges(directory: string): Promise<SyncResult> {
    const steps: string[][] = [
      ['reset', '--hard', 'HEAD'],
      ['clean', '-fd'],
      ['pull', '--ff-only'],
    ];

    let output = '';
    for (const step of steps) {
      // Per-command trust instead of `git config --global --add safe.directory`
      const args = ['-c', `safe.directory=${directory}`, ...step];
      this.logger.debug(`git ${step.join(' ')} → ${directory}`);

      try {
        const { stdout } = await this.run(args, { cwd: directory, timeout: this.timeoutMs });
        output = stdout.trim();
      } catch (error) {
        const diagnostic = describeGitError(error);
        this.logger.debug(`git ${step[0]} failed in ${directory}: ${diagnostic}`);
        return { success: false, message: diagnostic };
      }
    }

    return { success: true, message: output };
  }
}
