/**
 * Password store types
 *
 * Entries, decrypted payloads and the decryptor contract shared by the
 * walker, the decryption backends and the export pipeline.
 */

// --- Error Taxonomy --------------------------------------

/**
 * Error codes for categorizing export failures.
 * Fatal codes abort the whole run; the rest are recorded per entry.
 */
export enum ExportErrorCode {
  /** Store root (or a directory below it) cannot be listed */
  ENUMERATION_FAILED = 'ENUMERATION_FAILED',
  /** Decryption binary is missing from PATH */
  TOOL_NOT_FOUND = 'TOOL_NOT_FOUND',
  /** Output file could not be written */
  SINK_FAILED = 'SINK_FAILED',
  /** Invalid configuration value */
  CONFIG_ERROR = 'CONFIG_ERROR',
  /** Entry file exists but cannot be read */
  UNREADABLE_ENTRY = 'UNREADABLE_ENTRY',
  /** Wrong or missing passphrase, or no secret key for the entry */
  DECRYPTION_FAILED = 'DECRYPTION_FAILED',
  /** Blob is damaged or not an OpenPGP message */
  CORRUPT_ENTRY = 'CORRUPT_ENTRY',
  /** Decryption did not finish within the configured timeout */
  TIMEOUT = 'TIMEOUT',
  /** Programming error (e.g. illegal run phase transition) */
  INTERNAL = 'INTERNAL',
}

const FATAL_CODES: ReadonlySet<ExportErrorCode> = new Set([
  ExportErrorCode.ENUMERATION_FAILED,
  ExportErrorCode.TOOL_NOT_FOUND,
  ExportErrorCode.SINK_FAILED,
  ExportErrorCode.CONFIG_ERROR,
  ExportErrorCode.INTERNAL,
]);

const FAILURE_REASONS: Record<ExportErrorCode, string> = {
  [ExportErrorCode.ENUMERATION_FAILED]: 'store could not be enumerated',
  [ExportErrorCode.TOOL_NOT_FOUND]: 'decryption tool not found',
  [ExportErrorCode.SINK_FAILED]: 'output could not be written',
  [ExportErrorCode.CONFIG_ERROR]: 'invalid configuration',
  [ExportErrorCode.UNREADABLE_ENTRY]: 'file not readable',
  [ExportErrorCode.DECRYPTION_FAILED]: 'decryption failed',
  [ExportErrorCode.CORRUPT_ENTRY]: 'corrupt or undecryptable data',
  [ExportErrorCode.TIMEOUT]: 'decryption timed out',
  [ExportErrorCode.INTERNAL]: 'internal error',
};

/**
 * Typed error for export operations.
 */
export class ExportError extends Error {
  readonly code: ExportErrorCode;
  readonly entry?: string;

  constructor(
    code: ExportErrorCode,
    message: string,
    options?: { entry?: string; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ExportError';
    this.code = code;
    this.entry = options?.entry;
  }
}

export function isFatal(code: ExportErrorCode): boolean {
  return FATAL_CODES.has(code);
}

/**
 * Short operator-facing reason for a failure code, used in run summaries.
 */
export function describeFailure(code: ExportErrorCode): string {
  return FAILURE_REASONS[code];
}

// --- Entries ---------------------------------------------

/**
 * One item of the password store.
 */
export interface EncryptedEntry {
  /** Logical name, slash-separated (e.g. "social/example.com/alice") */
  readonly name: string;
  /** Absolute path to the encrypted blob */
  readonly path: string;
}

/**
 * Non-empty plaintext lines of one decrypted entry.
 * Must never be logged or written anywhere except through classified fields.
 */
export type DecryptedPayload = readonly string[];

export type WalkItem =
  | { ok: true; entry: EncryptedEntry }
  | { ok: false; name: string; error: ExportError };

// --- Decryptor -------------------------------------------

/**
 * Capability that turns an encrypted entry into its plaintext lines.
 */
export interface Decryptor {
  /** Backend identifier ("gpg", "pass", ...) */
  readonly name: string;

  /**
   * Check that the external tool is available.
   * @throws ExportError with TOOL_NOT_FOUND when it is not
   */
  initialize(): Promise<void>;

  /**
   * Decrypt one entry.
   * @throws ExportError with a per-entry code (or TOOL_NOT_FOUND)
   */
  decrypt(entry: EncryptedEntry): Promise<DecryptedPayload>;
}

export interface DecryptorOptions {
  /** Store root; the pass backend needs it as PASSWORD_STORE_DIR */
  storeDir: string;
  /** Binary to invoke (defaults per backend) */
  binary?: string;
  /** Pre-supplied passphrase, used instead of an interactive prompt */
  passphrase?: string;
  /** Set when the passphrase was preset into gpg-agent for this keygrip */
  keygrip?: string;
  /** Per-entry timeout in milliseconds */
  timeout?: number;
}

/**
 * Normalize decrypted text into payload lines: line endings unified,
 * trailing whitespace trimmed, blank lines dropped.
 */
export function toPayloadLines(text: string): DecryptedPayload {
  return text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map(line => line.trimEnd())
    .filter(line => line.trim().length > 0);
}
