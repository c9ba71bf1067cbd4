/**
 * Password store access
 *
 * Built-in decryption backends:
 *   - gpg: decrypts blobs with `gpg --decrypt` (default)
 *   - pass: delegates to `pass show`
 *
 * Usage:
 *   import { createDecryptor, walkStore } from './store';
 *
 *   const decryptor = createDecryptor('gpg', { storeDir, passphrase });
 *   await decryptor.initialize();
 *   for await (const item of walkStore(storeDir)) { ... }
 */

export { createDecryptor, registerBackend, listBackends } from './registry';
export type { DecryptorFactory } from './registry';

export type {
  Decryptor,
  DecryptorOptions,
  DecryptedPayload,
  EncryptedEntry,
  WalkItem,
} from './types';

export {
  ExportError,
  ExportErrorCode,
  isFatal,
  describeFailure,
  toPayloadLines,
} from './types';

export { walkStore, listEntries, countEntries, entryNameFromPath, DEFAULT_EXTENSION } from './walker';
export { GpgDecryptor, classifyDecryptFailure } from './gpg';
export { PassDecryptor } from './pass';
