import { mkdirSync, mkdtempSync, realpathSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ServerConfiguration } from './types';
import { Logger } from './utils/logger';

export function createTestLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

const temporaryDirectories: string[] = [];

/**
 * Canonical temporary directory, removed by `removeTemporaryDirectories`.
 */
export function createTemporaryDirectory(prefix: string): string {
  const directory = realpathSync(mkdtempSync(path.join(tmpdir(), prefix)));
  temporaryDirectories.push(directory);
  return directory;
}

export function removeTemporaryDirectories(): void {
  for (const directory of temporaryDirectories.splice(0)) {
    rmSync(directory, { recursive: true, force: true });
  }
}

/**
 * Temporary repository root holding the given subdirectories.
 * The returned root is canonical and ends with the path separator.
 */
export function createRepositoryRoot(...directories: string[]): string {
  const root = createTemporaryDirectory('deployer-') + path.sep;
  for (const directory of directories) {
    mkdirSync(path.join(root, directory), { recursive: true });
  }
  return root;
}

export function createTestConfig(overrides: Partial<ServerConfiguration> & { repositoryRoot: string }): ServerConfiguration {
  return {
    port: 0,
    securityToken: 'abc123',
    debug: false,
    restartTriggerFile: path.join(overrides.repositoryRoot, '.restart-trigger'),
    pollIntervalMs: 1000,
    gitTimeoutMs: 5000,
    ...overrides,
  };
}
