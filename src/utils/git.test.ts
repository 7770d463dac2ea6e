import { createTestLogger } from '../test-helpers';
import { GitManager, GitRunner, describeGitError } from './git';

function gitError(message: string, extra: { stderr?: string; killed?: boolean }): Error {
  return Object.assign(new Error(message), extra);
}

describe('GitManager', () => {
  const directory = '/srv/sites/blog';

  it('resets, cleans and pulls in the target directory', async () => {
    const run = jest.fn<ReturnType<GitRunner>, Parameters<GitRunner>>()
      .mockResolvedValueOnce({ stdout: 'HEAD is now at 1a2b3c4 Initial commit\n', stderr: '' })
      .mockResolvedValueOnce({ stdout: 'Removing scratch.txt\n', stderr: '' })
      .mockResolvedValueOnce({ stdout: 'Already up to date.\n', stderr: '' });
    const git = new GitManager(5000, createTestLogger(), run);

    const result = await git.synchronize(directory);

    expect(result).toEqual({ success: true, message: 'Already up to date.' });
    expect(run.mock.calls).toEqual([
      [['-c', `safe.directory=${directory}`, 'reset', '--hard', 'HEAD'], { cwd: directory, timeout: 5000 }],
      [['-c', `safe.directory=${directory}`, 'clean', '-fd'], { cwd: directory, timeout: 5000 }],
      [['-c', `safe.directory=${directory}`, 'pull', '--ff-only'], { cwd: directory, timeout: 5000 }],
    ]);
  });

  it('reports the stderr of the failing command', async () => {
    const run = jest.fn<ReturnType<GitRunner>, Parameters<GitRunner>>(async (args) => {
      if (args.includes('pull')) {
        throw gitError('Command failed: git pull --ff-only', {
          stderr: 'fatal: Not possible to fast-forward, aborting.\n',
        });
      }
      return { stdout: '', stderr: '' };
    });
    const git = new GitManager(5000, createTestLogger(), run);

    const result = await git.synchronize(directory);

    expect(result).toEqual({ success: false, message: 'fatal: Not possible to fast-forward, aborting.' });
    expect(run).toHaveBeenCalledTimes(3);
  });

  it('stops at the first failing command', async () => {
    const run = jest.fn<ReturnType<GitRunner>, Parameters<GitRunner>>()
      .mockRejectedValueOnce(gitError('Command failed', { stderr: 'fatal: not a git repository\n' }));
    const git = new GitManager(5000, createTestLogger(), run);

    const result = await git.synchronize(directory);

    expect(result).toEqual({ success: false, message: 'fatal: not a git repository' });
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('serializes calls for the same directory', async () => {
    let active = 0;
    let maxActive = 0;
    const run: GitRunner = async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setImmediate(resolve));
      active--;
      return { stdout: '', stderr: '' };
    };
    const git = new GitManager(5000, createTestLogger(), run);

    const results = await Promise.all([git.synchronize(directory), git.synchronize(directory)]);

    expect(results.every((result) => result.success)).toBe(true);
    expect(maxActive).toBe(1);
  });

  it('runs different directories in parallel', async () => {
    let active = 0;
    let maxActive = 0;
    const run: GitRunner = async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setImmediate(resolve));
      active--;
      return { stdout: '', stderr: '' };
    };
    const git = new GitManager(5000, createTestLogger(), run);

    await Promise.all([git.synchronize('/srv/sites/blog'), git.synchronize('/srv/sites/shop')]);

    expect(maxActive).toBe(2);
  });

  it('keeps serving a directory after a failed sync', async () => {
    const run = jest.fn<ReturnType<GitRunner>, Parameters<GitRunner>>()
      .mockRejectedValueOnce(gitError('Command failed', { stderr: 'error: index.lock exists\n' }))
      .mockResolvedValue({ stdout: 'Already up to date.\n', stderr: '' });
    const git = new GitManager(5000, createTestLogger(), run);

    const first = git.synchronize(directory);
    const second = git.synchronize(directory);

    expect(await first).toEqual({ success: false, message: 'error: index.lock exists' });
    expect(await second).toEqual({ success: true, message: 'Already up to date.' });
  });
});

describe('describeGitError', () => {
  it('prefers stderr', () => {
    expect(describeGitError(gitError('Command failed', { stderr: '  fatal: bad remote  \n' }))).toBe('fatal: bad remote');
  });

  it('reports a killed command as a timeout', () => {
    expect(describeGitError(gitError('Command failed', { stderr: '', killed: true }))).toBe('git command timed out');
  });

  it('falls back to the error message', () => {
    expect(describeGitError(new Error('spawn git ENOENT'))).toBe('spawn git ENOENT');
  });

  it('handles non-error values', () => {
    expect(describeGitError('boom')).toBe('Unknown error');
  });
});
