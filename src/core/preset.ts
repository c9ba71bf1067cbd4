/**
 * Preset a passphrase into gpg-agent so decryption runs without pinentry.
 * Requires `allow-preset-passphrase` in gpg-agent.conf.
 */

import fs from 'fs';
import path from 'path';
import { runProcess } from './exec';

export const FALLBACK_PRESET_PATHS = [
  '/usr/local/bin/gpg-preset-passphrase',
  '/usr/bin/gpg-preset-passphrase',
  '/opt/homebrew/bin/gpg-preset-passphrase',
  '/usr/lib/gnupg/gpg-preset-passphrase',
  '/usr/libexec/gpg-preset-passphrase',
];

export interface PresetResult {
  ok: boolean;
  error?: string;
}

async function gpgLibexecDir(gpgconf: string): Promise<string | null> {
  try {
    const result = await runProcess([gpgconf, '--list-dirs', 'libexecdir']);
    const dir = result.stdout.trim();
    return result.exitCode === 0 && dir ? dir : null;
  } catch {
    // gpgconf missing
    return null;
  }
}

/**
 * Locate gpg-preset-passphrase via gpgconf, then well-known paths.
 */
export async function findPresetBinary(
  options: { gpgconf?: string; candidates?: string[] } = {}
): Promise<string | null> {
  const libexecDir = await gpgLibexecDir(options.gpgconf || 'gpgconf');
  if (libexecDir) {
    const candidate = path.join(libexecDir, 'gpg-preset-passphrase');
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  for (const candidate of options.candidates || FALLBACK_PRESET_PATHS) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  return null;
}

export async function presetPassphrase(
  keygrip: string,
  passphrase: string,
  options: { binary?: string } = {}
): Promise<PresetResult> {
  if (!keygrip) {
    return { ok: false, error: 'No keygrip configured' };
  }
  if (!passphrase) {
    return { ok: false, error: 'No passphrase supplied' };
  }

  const binary = options.binary || await findPresetBinary();
  if (!binary) {
    return {
      ok: false,
      error: 'Could not find gpg-preset-passphrase. Please ensure GnuPG is properly installed.',
    };
  }

  try {
    const result = await runProcess([binary, '--preset', keygrip], {
      stdin: passphrase,
      secrets: [passphrase],
    });
    if (result.exitCode !== 0) {
      return { ok: false, error: result.stderr.trim() || `exit code ${result.exitCode}` };
    }
    return { ok: true };
  } catch (err) {
    return { ok: false, error: (err as Error).message };
  }
}
