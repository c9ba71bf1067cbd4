/**
 * Tests for subprocess execution
 */

import { describe, it, expect } from 'vitest';
import { runProcess, scrubSecrets, SpawnError } from './exec';

const node = process.execPath;

describe('scrubSecrets', () => {
  it('replaces every occurrence of each secret', () => {
    expect(scrubSecrets('a test-secret b test-secret', ['test-secret'])).toBe('a [REDACTED] b [REDACTED]');
  });

  it('ignores empty secrets', () => {
    expect(scrubSecrets('unchanged', ['', 'other'])).toBe('unchanged');
  });
});

describe('runProcess', () => {
  it('collects stdout and the exit code', async () => {
    const result = await runProcess([node, '-e', 'process.stdout.write("hello world")']);
    expect(result.stdout).toBe('hello world');
    expect(result.exitCode).toBe(0);
    expect(result.timedOut).toBe(false);
  });

  it('feeds stdin to the process', async () => {
    const result = await runProcess([node, '-e', 'process.stdin.pipe(process.stdout)'], {
      stdin: 'line one\nline two\n',
    });
    expect(result.stdout).toBe('line one\nline two\n');
  });

  it('passes extra environment variables', async () => {
    const result = await runProcess([node, '-e', 'process.stdout.write(process.env.PASSWORD_STORE_DIR || "")'], {
      env: { PASSWORD_STORE_DIR: '/tmp/store' },
    });
    expect(result.stdout).toBe('/tmp/store');
  });

  it('returns non-zero exit codes', async () => {
    const result = await runProcess([node, '-e', 'process.exit(3)']);
    expect(result.exitCode).toBe(3);
  });

  it('scrubs secrets from stderr', async () => {
    const result = await runProcess([node, '-e', 'console.error("bad passphrase test-secret")'], {
      secrets: ['test-secret'],
    });
    expect(result.stderr).toBe('bad passphrase [REDACTED]\n');
  });

  it('flags processes killed by the timeout', async () => {
    const result = await runProcess([node, '-e', 'setTimeout(() => {}, 5000)'], { timeout: 200 });
    expect(result.timedOut).toBe(true);
  });

  it('rejects with SpawnError when the executable is missing', async () => {
    const error = await runProcess(['/nonexistent/pass-export-tool']).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(SpawnError);
    expect(error instanceof SpawnError && error.notFound).toBe(true);
  });
});
