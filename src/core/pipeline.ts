/**
 * Export pipeline
 *
 * walk -> decrypt -> classify -> serialize, one entry at a time.
 * Per-entry failures are collected and the run continues; rows reach the
 * sink in a single write after the last entry, so an interrupted run
 * leaves no partial export behind.
 */

import { classifyPayload } from './classifier';
import { toOutputRow, type OutputRow, type RowSink } from './serializer';
import type { RunEventSink } from './audit';
import { walkStore, type WalkOptions } from '../store/walker';
import {
  type DecryptedPayload,
  type Decryptor,
  type EncryptedEntry,
  ExportError,
  ExportErrorCode,
  type WalkItem,
  describeFailure,
  isFatal,
} from '../store/types';

export type RunPhase = 'start' | 'enumerating' | 'processing' | 'finalizing' | 'done';

const PHASE_ORDER: RunPhase[] = ['start', 'enumerating', 'processing', 'finalizing', 'done'];

export interface EntryFailure {
  name: string;
  code: ExportErrorCode;
  reason: string;
  detail: string;
}

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  failures: EntryFailure[];
  /** False when there was nothing to write */
  written: boolean;
  output?: string;
}

export interface ExportOptions {
  root: string;
  decryptor: Decryptor;
  sink: RowSink;
  vault?: string;
  noteSeparator?: string;
  walk?: WalkOptions;
  logger?: RunEventSink;
  onProgress?: (event: ProgressEvent) => void;
}

export interface ProgressEvent {
  index: number;
  name: string;
  ok: boolean;
}

/**
 * State of one export run. Phases only move forward.
 */
export class ExportRun {
  private _phase: RunPhase = 'start';
  private readonly rows: OutputRow[] = [];
  private readonly failures: EntryFailure[] = [];

  get phase(): RunPhase {
    return this._phase;
  }

  advance(next: RunPhase): void {
    const from = PHASE_ORDER.indexOf(this._phase);
    const to = PHASE_ORDER.indexOf(next);
    if (to <= from) {
      throw new ExportError(
        ExportErrorCode.INTERNAL,
        `Illegal run phase transition: ${this._phase} -> ${next}`
      );
    }
    this._phase = next;
  }

  addRow(row: OutputRow): void {
    this.rows.push(row);
  }

  addFailure(name: string, error: ExportError): EntryFailure {
    const failure: EntryFailure = {
      name,
      code: error.code,
      reason: describeFailure(error.code),
      detail: error.message,
    };
    this.failures.push(failure);
    return failure;
  }

  getRows(): readonly OutputRow[] {
    return this.rows;
  }

  getFailures(): readonly EntryFailure[] {
    return this.failures;
  }
}

function toExportError(err: unknown, entry: EncryptedEntry): ExportError {
  if (err instanceof ExportError) return err;
  return new ExportError(
    ExportErrorCode.CORRUPT_ENTRY,
    `Unexpected failure for "${entry.name}": ${err instanceof Error ? err.message : String(err)}`,
    { entry: entry.name, cause: err }
  );
}

async function processEntry(
  run: ExportRun,
  entry: EncryptedEntry,
  options: ExportOptions
): Promise<boolean> {
  let lines: DecryptedPayload;
  try {
    lines = await options.decryptor.decrypt(entry);
  } catch (err) {
    const error = toExportError(err, entry);
    if (isFatal(error.code)) throw error;
    const failure = run.addFailure(entry.name, error);
    options.logger?.record({ type: 'entry_failed', entry: entry.name, code: failure.code, reason: failure.reason });
    return false;
  }

  const record = classifyPayload(entry.name, lines, { noteSeparator: options.noteSeparator });
  run.addRow(toOutputRow(record, { vault: options.vault }));
  options.logger?.record({ type: 'entry_exported', entry: entry.name });
  return true;
}

/**
 * Run a full export.
 *
 * @throws ExportError for fatal conditions (enumeration, missing tool, sink)
 */
export async function runExport(options: ExportOptions, run: ExportRun = new ExportRun()): Promise<RunSummary> {
  options.logger?.record({ type: 'run_started', store: options.root });

  await options.decryptor.initialize();

  run.advance('enumerating');
  const items: AsyncGenerator<WalkItem> = walkStore(options.root, options.walk);

  run.advance('processing');
  let index = 0;
  for await (const item of items) {
    index++;
    let ok: boolean;
    if (item.ok) {
      ok = await processEntry(run, item.entry, options);
    } else {
      const failure = run.addFailure(item.name, item.error);
      options.logger?.record({ type: 'entry_failed', entry: item.name, code: failure.code, reason: failure.reason });
      ok = false;
    }
    options.onProgress?.({ index, name: item.ok ? item.entry.name : item.name, ok });
  }

  run.advance('finalizing');
  const rows = run.getRows();
  const written = rows.length > 0;
  if (written) {
    await options.sink.write(rows);
  }

  const failures = [...run.getFailures()];
  const summary: RunSummary = {
    total: index,
    succeeded: rows.length,
    failed: failures.length,
    failures,
    written,
    output: written ? options.sink.location : undefined,
  };

  options.logger?.record({
    type: 'run_finished',
    total: summary.total,
    succeeded: summary.succeeded,
    failed: summary.failed,
    output: summary.output,
  });

  run.advance('done');
  return summary;
}

/**
 * Human-readable summary lines for the operator.
 */
export function formatSummary(summary: RunSummary): string[] {
  const lines = [`Successfully processed ${summary.succeeded}/${summary.total} entries`];

  if (summary.written && summary.output) {
    lines.push(`CSV file written to: ${summary.output}`);
    lines.push(`Total entries in CSV: ${summary.succeeded}`);
  } else {
    lines.push('No entries were processed successfully; nothing was written');
  }

  if (summary.failures.length > 0) {
    lines.push('');
    lines.push(`Failed entries (${summary.failed}):`);
    for (const failure of summary.failures) {
      lines.push(`  ${failure.name}: ${failure.reason}`);
    }
  }

  return lines;
}
