/**
 * GnuPG decryption backend
 *
 * Decrypts store blobs directly with `gpg --decrypt`. A pre-supplied
 * passphrase is passed through loopback pinentry on stdin; without one
 * (or when it was preset into gpg-agent) the agent handles unlocking.
 */

import { runProcess, SpawnError, type ProcessResult } from '../core/exec';
import {
  type Decryptor,
  type DecryptorOptions,
  type DecryptedPayload,
  type EncryptedEntry,
  ExportError,
  ExportErrorCode,
  toPayloadLines,
} from './types';

const DECRYPTION_FAILED_PATTERNS = [
  /bad passphrase/i,
  /no secret key/i,
  /no passphrase given/i,
  /operation cancelled/i,
  /inappropriate ioctl for device/i,
  /no pinentry/i,
];

const NOT_IN_STORE_PATTERN = /is not in the password store/i;

/**
 * Map a failed decryption's stderr to a per-entry error code.
 */
export function classifyDecryptFailure(stderr: string): ExportErrorCode {
  if (NOT_IN_STORE_PATTERN.test(stderr)) {
    return ExportErrorCode.UNREADABLE_ENTRY;
  }
  if (DECRYPTION_FAILED_PATTERNS.some(pattern => pattern.test(stderr))) {
    return ExportErrorCode.DECRYPTION_FAILED;
  }
  return ExportErrorCode.CORRUPT_ENTRY;
}

/**
 * Turn a finished process into a payload or a typed error.
 * Shared by the gpg and pass backends.
 */
export function payloadFromResult(result: ProcessResult, entry: EncryptedEntry, tool: string): DecryptedPayload {
  if (result.timedOut) {
    throw new ExportError(
      ExportErrorCode.TIMEOUT,
      `${tool} timed out decrypting "${entry.name}"`,
      { entry: entry.name }
    );
  }

  if (result.exitCode !== 0) {
    const code = classifyDecryptFailure(result.stderr);
    const detail = result.stderr.trim().split('\n').pop() || `exit code ${result.exitCode}`;
    throw new ExportError(code, `${tool} failed for "${entry.name}": ${detail}`, { entry: entry.name });
  }

  return toPayloadLines(result.stdout);
}

export function spawnFailure(err: unknown, tool: string, entry?: EncryptedEntry): ExportError {
  if (err instanceof SpawnError && err.notFound) {
    return new ExportError(
      ExportErrorCode.TOOL_NOT_FOUND,
      `"${tool}" was not found. Install GnuPG (and pass) or set decrypt.gpgBinary / decrypt.passBinary in config.yaml`,
      { entry: entry?.name, cause: err }
    );
  }
  return new ExportError(
    ExportErrorCode.CORRUPT_ENTRY,
    `${tool} could not be run${entry ? ` for "${entry.name}"` : ''}: ${(err as Error).message}`,
    { entry: entry?.name, cause: err }
  );
}

export class GpgDecryptor implements Decryptor {
  readonly name = 'gpg';

  private binary: string;
  private passphrase?: string;
  private keygrip?: string;
  private timeout?: number;

  constructor(options: DecryptorOptions) {
    this.binary = options.binary || 'gpg';
    this.passphrase = options.passphrase;
    this.keygrip = options.keygrip;
    this.timeout = options.timeout;
  }

  async initialize(): Promise<void> {
    try {
      await runProcess([this.binary, '--version'], { timeout: this.timeout });
    } catch (err) {
      throw spawnFailure(err, this.binary);
    }
  }

  /**
   * Loopback pinentry is used only when a passphrase is supplied and
   * was not already preset into the agent.
   */
  usesLoopback(): boolean {
    return Boolean(this.passphrase) && !this.keygrip;
  }

  buildCommand(entry: EncryptedEntry): string[] {
    const command = [this.binary, '--quiet', '--batch', '--yes'];
    if (this.usesLoopback()) {
      command.push('--pinentry-mode', 'loopback', '--passphrase-fd', '0');
    }
    command.push('--decrypt', entry.path);
    return command;
  }

  async decrypt(entry: EncryptedEntry): Promise<DecryptedPayload> {
    let result: ProcessResult;
    try {
      result = await runProcess(this.buildCommand(entry), {
        stdin: this.usesLoopback() ? `${this.passphrase}\n` : undefined,
        timeout: this.timeout,
        secrets: this.passphrase ? [this.passphrase] : [],
      });
    } catch (err) {
      throw spawnFailure(err, this.binary, entry);
    }

    return payloadFromResult(result, entry, this.binary);
  }
}
