/**
 * pass(1) decryption backend
 *
 * Delegates to `pass show <name>`, letting pass pick the right key
 * from the store's .gpg-id files. A supplied passphrase reaches gpg
 * through PASSWORD_STORE_GPG_OPTS and stdin, which pass hands on.
 */

import { runProcess, type ProcessResult } from '../core/exec';
import { payloadFromResult, spawnFailure } from './gpg';
import type { Decryptor, DecryptorOptions, DecryptedPayload, EncryptedEntry } from './types';

const LOOPBACK_GPG_OPTS = '--pinentry-mode loopback --passphrase-fd 0';

export class PassDecryptor implements Decryptor {
  readonly name = 'pass';

  private binary: string;
  private storeDir: string;
  private passphrase?: string;
  private keygrip?: string;
  private timeout?: number;

  constructor(options: DecryptorOptions) {
    this.binary = options.binary || 'pass';
    this.storeDir = options.storeDir;
    this.passphrase = options.passphrase;
    this.keygrip = options.keygrip;
    this.timeout = options.timeout;
  }

  async initialize(): Promise<void> {
    try {
      await runProcess([this.binary, 'version'], { timeout: this.timeout });
    } catch (err) {
      throw spawnFailure(err, this.binary);
    }
  }

  usesLoopback(): boolean {
    return Boolean(this.passphrase) && !this.keygrip;
  }

  buildEnv(): Record<string, string> {
    const env: Record<string, string> = { PASSWORD_STORE_DIR: this.storeDir };
    if (this.usesLoopback()) {
      env.PASSWORD_STORE_GPG_OPTS = LOOPBACK_GPG_OPTS;
    }
    return env;
  }

  async decrypt(entry: EncryptedEntry): Promise<DecryptedPayload> {
    let result: ProcessResult;
    try {
      result = await runProcess([this.binary, 'show', entry.name], {
        env: this.buildEnv(),
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
