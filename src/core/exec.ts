/**
 * Subprocess execution for decryption backends
 *
 * Runs an external tool without a shell, feeds optional stdin and
 * collects its output. Stdout is returned as-is to the caller and is
 * never logged; stderr has the supplied secrets scrubbed.
 */

import { spawn } from 'child_process';

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  executionTimeMs: number;
}

export interface ProcessOptions {
  env?: Record<string, string>;
  stdin?: string;
  timeout?: number;  // ms (default: 30000)
  /** Values to redact from stderr */
  secrets?: string[];
}

/**
 * Raised when the executable cannot be spawned at all.
 */
export class SpawnError extends Error {
  readonly errno?: string;

  constructor(command: string, cause: NodeJS.ErrnoException) {
    super(`Failed to execute ${command}: ${cause.message}`, { cause });
    this.name = 'SpawnError';
    this.errno = cause.code;
  }

  get notFound(): boolean {
    return this.errno === 'ENOENT';
  }
}

/**
 * Replace secret values in tool output.
 */
export function scrubSecrets(output: string, secrets: string[] = []): string {
  let scrubbed = output;
  for (const secret of secrets) {
    if (secret) {
      scrubbed = scrubbed.split(secret).join('[REDACTED]');
    }
  }
  return scrubbed;
}

export async function runProcess(command: string[], options: ProcessOptions = {}): Promise<ProcessResult> {
  const timeout = options.timeout || 30000;
  const startTime = Date.now();

  return new Promise((resolve, reject) => {
    const proc = spawn(command[0], command.slice(1), {
      env: {
        ...process.env,
        ...options.env,
      },
      stdio: ['pipe', 'pipe', 'pipe'],
      timeout,
      shell: false,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let failed = false;

    proc.stdout.on('data', (data: Buffer) => {
      stdout.push(data);
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr.push(data);
    });

    // The child may exit before reading its stdin
    proc.stdin.on('error', () => undefined);

    if (options.stdin !== undefined) {
      proc.stdin.write(options.stdin);
    }
    proc.stdin.end();

    proc.on('close', (code, signal) => {
      if (failed) return;
      resolve({
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: scrubSecrets(Buffer.concat(stderr).toString('utf8'), options.secrets),
        exitCode: code ?? 1,
        timedOut: code === null && signal === 'SIGTERM' && Date.now() - startTime >= timeout,
        executionTimeMs: Date.now() - startTime,
      });
    });

    proc.on('error', (error: NodeJS.ErrnoException) => {
      failed = true;
      reject(new SpawnError(command[0], error));
    });
  });
}
