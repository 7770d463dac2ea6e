import { realpathSync, statSync } from 'node:fs';
import path from 'node:path';
import { ServerConfiguration } from './types';

export const DEFAULT_PORT = 5123;
export const DEFAULT_RESTART_TRIGGER_FILE = '/tmp/webhook_restart_trigger';
export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_GIT_TIMEOUT_MS = 120000;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Options as commander hands them over */
export type CliOptions = {
  gitRepoDir?: string;
  port?: string;
  securityToken?: string;
  debug?: boolean;
  restartTrigger?: string;
  pollInterval?: string;
  gitTimeout?: string;
};

function parseInteger(name: string, raw: string, min: number, max: number): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min || value > max) {
    throw new ConfigError(`${name} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

function parseSecurityToken(option: string | undefined, env: string | undefined): string | undefined {
  const token = option ?? env;
  if (token === '') {
    throw new ConfigError('security token must not be empty');
  }
  return token;
}

function parseFlag(raw: string | undefined): boolean {
  return raw !== undefined && ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

function resolveRepositoryRoot(dir: string): string {
  let canonical: string;
  try {
    canonical = realpathSync(path.resolve(dir));
  } catch {
    throw new ConfigError(`Repository directory does not exist: ${dir}`);
  }
  if (!statSync(canonical).isDirectory()) {
    throw new ConfigError(`Repository directory is not a directory: ${dir}`);
  }
  return canonical.endsWith(path.sep) ? canonical : canonical + path.sep;
}

/**
 * Build the server configuration from command-line options, falling back to
 * environment variables and then to defaults.
 */
export function loadConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): ServerConfiguration {
  const gitRepoDir = nonEmpty(options.gitRepoDir) ?? nonEmpty(env.GIT_REPO_DIR);
  if (!gitRepoDir) {
    throw new ConfigError('--git-repo-dir (or GIT_REPO_DIR) is required');
  }

  const port = nonEmpty(options.port) ?? nonEmpty(env.PORT);
  const pollInterval = nonEmpty(options.pollInterval) ?? nonEmpty(env.POLL_INTERVAL_MS);
  const gitTimeout = nonEmpty(options.gitTimeout) ?? nonEmpty(env.GIT_TIMEOUT_MS);

  return Object.freeze({
    repositoryRoot: resolveRepositoryRoot(gitRepoDir),
    port: port === undefined ? DEFAULT_PORT : parseInteger('port', port, 1, 65535),
    securityToken: parseSecurityToken(options.securityToken, env.SECURITY_TOKEN),
    debug: options.debug === true || parseFlag(env.DEBUG),
    restartTriggerFile: path.resolve(
      nonEmpty(options.restartTrigger) ?? nonEmpty(env.RESTART_TRIGGER_FILE) ?? DEFAULT_RESTART_TRIGGER_FILE,
    ),
    pollIntervalMs:
      pollInterval === undefined ? DEFAULT_POLL_INTERVAL_MS : parseInteger('poll interval', pollInterval, 10, 3600000),
    gitTimeoutMs:
      gitTimeout === undefined ? DEFAULT_GIT_TIMEOUT_MS : parseInteger('git timeout', gitTimeout, 1000, 3600000),
  });
}
