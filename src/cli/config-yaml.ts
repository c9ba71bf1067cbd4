/**
 * YAML configuration for pass-export
 * Lives in ~/.pass-export/config.yaml; every field is optional.
 * The passphrase itself is never stored here, only the name of the
 * environment variable that holds it.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ExportError, ExportErrorCode } from '../store/types';

export type DecryptBackend = 'gpg' | 'pass';

export interface DecryptConfig {
  backend: DecryptBackend;
  gpgBinary: string;
  passBinary: string;
  timeout: number;  // ms per entry
  keygrip?: string;
  passphraseEnv: string;
}

export interface ExportConfig {
  version: string;
  store: string;
  output: string;
  vault: string;
  noteSeparator: string;
  decrypt: DecryptConfig;
}

export const CONFIG_VERSION = '0.1.0';

const BACKENDS: readonly DecryptBackend[] = ['gpg', 'pass'];

/**
 * Get config directory path (dynamically computed for testability)
 */
export function getConfigDir(): string {
  return path.join(os.homedir(), '.pass-export');
}

export function getConfigFile(): string {
  return path.join(getConfigDir(), 'config.yaml');
}

/**
 * Get run log directory path
 */
export function getLogDir(): string {
  return path.join(getConfigDir(), 'logs');
}

export function hasYAMLConfig(): boolean {
  return fs.existsSync(getConfigFile());
}

export function defaultConfig(): ExportConfig {
  return {
    version: CONFIG_VERSION,
    store: '~/.password-store',
    output: path.join('~', '.pass-export', 'protonpass.csv'),
    vault: '',
    noteSeparator: '\n',
    decrypt: {
      backend: 'gpg',
      gpgBinary: 'gpg',
      passBinary: 'pass',
      timeout: 30000,
      passphraseEnv: 'GPG_PASSPHRASE',
    },
  };
}

/**
 * Expand a leading "~" to the home directory.
 */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/') || p.startsWith('~' + path.sep)) {
    return path.join(os.homedir(), p.slice(2));
  }
  return p;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string, fallback: string, where: string): string {
  const value = source[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string') {
    throw new ExportError(ExportErrorCode.CONFIG_ERROR, `${where}${key} must be a string`);
  }
  return value;
}

/**
 * Validate parsed YAML and merge it over the defaults.
 */
export function parseConfig(raw: unknown): ExportConfig {
  const defaults = defaultConfig();
  if (raw === undefined || raw === null) return defaults;

  if (!isRecord(raw)) {
    throw new ExportError(ExportErrorCode.CONFIG_ERROR, 'config.yaml must contain a mapping');
  }

  const decryptRaw = raw.decrypt ?? {};
  if (!isRecord(decryptRaw)) {
    throw new ExportError(ExportErrorCode.CONFIG_ERROR, 'decrypt must be a mapping');
  }

  const backend = readString(decryptRaw, 'backend', defaults.decrypt.backend, 'decrypt.');
  const selected = BACKENDS.find(b => b === backend);
  if (!selected) {
    throw new ExportError(
      ExportErrorCode.CONFIG_ERROR,
      `decrypt.backend must be one of ${BACKENDS.join(', ')}, got "${backend}"`
    );
  }

  const timeout = decryptRaw.timeout ?? defaults.decrypt.timeout;
  if (typeof timeout !== 'number' || !Number.isFinite(timeout) || timeout <= 0) {
    throw new ExportError(ExportErrorCode.CONFIG_ERROR, 'decrypt.timeout must be a positive number of milliseconds');
  }

  const keygrip = readString(decryptRaw, 'keygrip', '', 'decrypt.');

  return {
    version: readString(raw, 'version', defaults.version, ''),
    store: readString(raw, 'store', defaults.store, ''),
    output: readString(raw, 'output', defaults.output, ''),
    vault: readString(raw, 'vault', defaults.vault, ''),
    noteSeparator: readString(raw, 'noteSeparator', defaults.noteSeparator, ''),
    decrypt: {
      backend: selected,
      gpgBinary: readString(decryptRaw, 'gpgBinary', defaults.decrypt.gpgBinary, 'decrypt.'),
      passBinary: readString(decryptRaw, 'passBinary', defaults.decrypt.passBinary, 'decrypt.'),
      timeout,
      keygrip: keygrip || undefined,
      passphraseEnv: readString(decryptRaw, 'passphraseEnv', defaults.decrypt.passphraseEnv, 'decrypt.'),
    },
  };
}

/**
 * Apply environment overrides (PASSWORD_STORE_DIR, ENCRYPTION_KEYGRIP).
 */
export function applyEnv(config: ExportConfig, env: NodeJS.ProcessEnv = process.env): ExportConfig {
  return {
    ...config,
    store: env.PASSWORD_STORE_DIR || config.store,
    decrypt: {
      ...config.decrypt,
      keygrip: env.ENCRYPTION_KEYGRIP || config.decrypt.keygrip,
    },
  };
}

/**
 * Load configuration: defaults, then config.yaml, then environment.
 */
export function loadYAMLConfig(env: NodeJS.ProcessEnv = process.env): ExportConfig {
  let parsed: unknown;
  if (hasYAMLConfig()) {
    try {
      parsed = yaml.load(fs.readFileSync(getConfigFile(), 'utf8'));
    } catch (err) {
      throw new ExportError(
        ExportErrorCode.CONFIG_ERROR,
        `Cannot parse ${getConfigFile()}: ${(err as Error).message}`,
        { cause: err }
      );
    }
  }
  return applyEnv(parseConfig(parsed), env);
}

/**
 * Read the pre-supplied passphrase from the configured environment variable.
 */
export function resolvePassphrase(config: ExportConfig, env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env[config.decrypt.passphraseEnv] || undefined;
}

export function saveYAMLConfig(config: ExportConfig): void {
  const dir = getConfigDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }

  const { keygrip, ...decrypt } = config.decrypt;
  const serializable = {
    ...config,
    decrypt: keygrip ? { ...decrypt, keygrip } : decrypt,
  };

  fs.writeFileSync(getConfigFile(), yaml.dump(serializable, { lineWidth: -1 }), { mode: 0o600 });
}
