/**
 * Store walker
 *
 * Enumerates encrypted entries below a pass store root in a stable,
 * lexical order. Every call starts a fresh traversal.
 */

import fs from 'fs';
import path from 'path';
import { ExportError, ExportErrorCode, type EncryptedEntry, type WalkItem } from './types';

export const DEFAULT_EXTENSION = '.gpg';

export interface WalkOptions {
  /** Encrypted blob suffix (default: ".gpg") */
  extension?: string;
}

/**
 * Derive the logical entry name from a blob path:
 * root prefix and extension stripped, separators shown as "/".
 */
export function entryNameFromPath(
  root: string,
  filePath: string,
  extension: string = DEFAULT_EXTENSION
): string {
  let relative = path.relative(root, filePath);
  if (relative.endsWith(extension)) {
    relative = relative.slice(0, -extension.length);
  }
  return relative.split(path.sep).join('/');
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

async function listDir(dir: string): Promise<fs.Dirent[]> {
  try {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => compareNames(a.name, b.name));
  } catch (err) {
    throw new ExportError(
      ExportErrorCode.ENUMERATION_FAILED,
      `Cannot read store directory "${dir}": ${(err as Error).message}`,
      { cause: err }
    );
  }
}

/**
 * Resolve what a directory entry points at, following symlinks.
 * Dangling links resolve to null and are skipped.
 */
async function resolveKind(fullPath: string, dirent: fs.Dirent): Promise<'dir' | 'file' | null> {
  if (dirent.isDirectory()) return 'dir';
  if (dirent.isFile()) return 'file';
  if (!dirent.isSymbolicLink()) return null;

  try {
    const stat = await fs.promises.stat(fullPath);
    if (stat.isDirectory()) return 'dir';
    if (stat.isFile()) return 'file';
    return null;
  } catch {
    return null;
  }
}

async function realDir(dir: string): Promise<string> {
  try {
    return await fs.promises.realpath(dir);
  } catch (err) {
    throw new ExportError(
      ExportErrorCode.ENUMERATION_FAILED,
      `Cannot resolve store directory "${dir}": ${(err as Error).message}`,
      { cause: err }
    );
  }
}

/**
 * `visited` holds real paths of directories already walked, so a
 * directory reached twice through symlinks (or a link cycle) is listed once.
 */
async function* walkDir(
  root: string,
  dir: string,
  extension: string,
  visited: Set<string>
): AsyncGenerator<WalkItem> {
  const real = await realDir(dir);
  if (visited.has(real)) return;
  visited.add(real);

  for (const dirent of await listDir(dir)) {
    // .git, .gpg-id, .extensions and other store metadata
    if (dirent.name.startsWith('.')) continue;

    const fullPath = path.join(dir, dirent.name);
    const kind = await resolveKind(fullPath, dirent);

    if (kind === 'dir') {
      yield* walkDir(root, fullPath, extension, visited);
      continue;
    }

    if (kind !== 'file' || !dirent.name.endsWith(extension)) continue;

    const name = entryNameFromPath(root, fullPath, extension);
    try {
      await fs.promises.access(fullPath, fs.constants.R_OK);
    } catch (err) {
      yield {
        ok: false,
        name,
        error: new ExportError(
          ExportErrorCode.UNREADABLE_ENTRY,
          `Cannot read "${name}": ${(err as Error).message}`,
          { entry: name, cause: err }
        ),
      };
      continue;
    }

    yield { ok: true, entry: { name, path: fullPath } };
  }
}

/**
 * Walk a store root, yielding one item per encrypted blob.
 *
 * @throws ExportError with ENUMERATION_FAILED when the root, or any
 *   directory beneath it, cannot be listed
 */
export async function* walkStore(root: string, options: WalkOptions = {}): AsyncGenerator<WalkItem> {
  const extension = options.extension || DEFAULT_EXTENSION;
  const resolvedRoot = path.resolve(root);

  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(resolvedRoot);
  } catch (err) {
    throw new ExportError(
      ExportErrorCode.ENUMERATION_FAILED,
      `Password store not found at "${resolvedRoot}"`,
      { cause: err }
    );
  }
  if (!stat.isDirectory()) {
    throw new ExportError(
      ExportErrorCode.ENUMERATION_FAILED,
      `Password store path "${resolvedRoot}" is not a directory`
    );
  }

  yield* walkDir(resolvedRoot, resolvedRoot, extension, new Set());
}

/**
 * Collect the entries of a store without decrypting anything.
 */
export async function listEntries(root: string, options: WalkOptions = {}): Promise<EncryptedEntry[]> {
  const entries: EncryptedEntry[] = [];
  for await (const item of walkStore(root, options)) {
    if (item.ok) entries.push(item.entry);
  }
  return entries;
}

/**
 * Count blobs (readable or not) below a store root.
 */
export async function countEntries(root: string, options: WalkOptions = {}): Promise<number> {
  let total = 0;
  for await (const _item of walkStore(root, options)) {
    total++;
  }
  return total;
}
