/**
 * Proton Pass CSV serialization
 */

import fs from 'fs';
import path from 'path';
import Papa from 'papaparse';
import type { ClassifiedRecord } from './classifier';
import { ExportError, ExportErrorCode } from '../store/types';

export const OUTPUT_COLUMNS = ['name', 'url', 'email', 'username', 'password', 'note', 'totp', 'vault'] as const;

export type OutputColumn = typeof OUTPUT_COLUMNS[number];

export type OutputRow = Readonly<Record<OutputColumn, string>>;

export function toOutputRow(record: ClassifiedRecord, options: { vault?: string } = {}): OutputRow {
  return {
    name: record.name,
    url: '',
    email: record.email,
    username: record.username,
    password: record.password,
    note: record.note,
    totp: '',
    vault: options.vault || '',
  };
}

/**
 * Render rows with the fixed header. Fields containing the delimiter,
 * a quote or a newline are quoted.
 */
export function renderCsv(rows: readonly OutputRow[]): string {
  return Papa.unparse(
    {
      fields: [...OUTPUT_COLUMNS],
      data: rows.map(row => OUTPUT_COLUMNS.map(column => row[column])),
    },
    { newline: '\n' }
  ) + '\n';
}

/**
 * Destination of a finished run. Written exactly once.
 */
export interface RowSink {
  /** Human-readable location, for the summary */
  readonly location: string;
  write(rows: readonly OutputRow[]): Promise<void>;
}

export class CsvFileSink implements RowSink {
  readonly location: string;

  constructor(filePath: string) {
    this.location = path.resolve(filePath);
  }

  async write(rows: readonly OutputRow[]): Promise<void> {
    const dir = path.dirname(this.location);
    try {
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
      }
      fs.writeFileSync(this.location, renderCsv(rows), { encoding: 'utf8', mode: 0o600 });
    } catch (err) {
      throw new ExportError(
        ExportErrorCode.SINK_FAILED,
        `Cannot write ${this.location}: ${(err as Error).message}`,
        { cause: err }
      );
    }
  }
}
