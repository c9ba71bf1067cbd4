/**
 * Decryptor registry
 *
 * Maps backend names from config.yaml to decryptor factories.
 */

import { type Decryptor, type DecryptorOptions, ExportError, ExportErrorCode } from './types';
import { GpgDecryptor } from './gpg';
import { PassDecryptor } from './pass';

export type DecryptorFactory = (options: DecryptorOptions) => Decryptor;

const factories = new Map<string, DecryptorFactory>();

/**
 * Register a decryption backend.
 */
export function registerBackend(name: string, factory: DecryptorFactory): void {
  if (factories.has(name)) {
    throw new ExportError(
      ExportErrorCode.CONFIG_ERROR,
      `Decryption backend "${name}" is already registered`
    );
  }
  factories.set(name, factory);
}

export function listBackends(): string[] {
  return Array.from(factories.keys());
}

/**
 * Create a decryptor for a backend name. Does not initialize it.
 */
export function createDecryptor(backend: string, options: DecryptorOptions): Decryptor {
  const factory = factories.get(backend);
  if (!factory) {
    throw new ExportError(
      ExportErrorCode.CONFIG_ERROR,
      `Unknown decryption backend "${backend}". Available backends: ${listBackends().join(', ')}`
    );
  }
  return factory(options);
}

registerBackend('gpg', (options) => new GpgDecryptor(options));
registerBackend('pass', (options) => new PassDecryptor(options));
