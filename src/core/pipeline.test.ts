/**
 * Tests for the export pipeline
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { runExport, formatSummary, ExportRun, type RunSummary } from './pipeline';
import { renderCsv, type OutputRow, type RowSink } from './serializer';
import type { RunEventInput, RunEventSink } from './audit';
import {
  type Decryptor,
  type DecryptedPayload,
  type EncryptedEntry,
  ExportError,
  ExportErrorCode,
} from '../store/types';

type Canned = DecryptedPayload | ExportError;

class FakeDecryptor implements Decryptor {
  readonly name = 'fake';
  readonly calls: string[] = [];

  constructor(
    private payloads: Record<string, Canned>,
    private initError?: ExportError
  ) {}

  async initialize(): Promise<void> {
    if (this.initError) throw this.initError;
  }

  async decrypt(entry: EncryptedEntry): Promise<DecryptedPayload> {
    this.calls.push(entry.name);
    const canned = this.payloads[entry.name];
    if (canned === undefined) return [];
    if (canned instanceof ExportError) throw canned;
    return canned;
  }
}

class MemorySink implements RowSink {
  readonly location = 'memory://export.csv';
  writes: (readonly OutputRow[])[] = [];

  async write(rows: readonly OutputRow[]): Promise<void> {
    this.writes.push([...rows]);
  }

  csv(): string {
    return renderCsv(this.writes[0] || []);
  }
}

class MemoryLogger implements RunEventSink {
  events: RunEventInput[] = [];

  record(event: RunEventInput): void {
    this.events.push(event);
  }
}

function badPassphrase(name: string): ExportError {
  return new ExportError(ExportErrorCode.DECRYPTION_FAILED, 'gpg: Bad passphrase', { entry: name });
}

describe('runExport', () => {
  let storeDir: string;

  function addEntry(name: string): void {
    const file = path.join(storeDir, `${name}.gpg`);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, 'ciphertext');
  }

  beforeEach(() => {
    storeDir = path.join(os.tmpdir(), `pass-export-pipeline-${Date.now()}-${Math.random().toString(36).substring(7)}`);
    fs.mkdirSync(storeDir, { recursive: true });
    fs.writeFileSync(path.join(storeDir, '.gpg-id'), 'KEYID\n');
    for (const name of ['bank', 'email/personal', 'email/work', 'social/example.com/alice', 'wifi']) {
      addEntry(name);
    }
  });

  afterEach(() => {
    fs.rmSync(storeDir, { recursive: true, force: true });
  });

  it('exports every entry in traversal order', async () => {
    const decryptor = new FakeDecryptor({
      'social/example.com/alice': ['s3cr3t', 'username: alice', 'alice@example.com', 'backup codes: 111 222'],
      bank: ['onlypassword'],
    });
    const sink = new MemorySink();

    const summary = await runExport({ root: storeDir, decryptor, sink });

    expect(decryptor.calls).toEqual(['bank', 'email/personal', 'email/work', 'social/example.com/alice', 'wifi']);
    expect(summary).toEqual({
      total: 5,
      succeeded: 5,
      failed: 0,
      failures: [],
      written: true,
      output: 'memory://export.csv',
    });
    expect(sink.writes).toHaveLength(1);
    expect(sink.writes[0][3]).toEqual({
      name: 'social/example.com/alice',
      url: '',
      email: 'alice@example.com',
      username: 'alice',
      password: 's3cr3t',
      note: 'backup codes: 111 222',
      totp: '',
      vault: '',
    });
  });

  it('skips an entry that fails to decrypt and reports it', async () => {
    const decryptor = new FakeDecryptor({
      'email/work': badPassphrase('email/work'),
      wifi: ['hunter2'],
    });
    const sink = new MemorySink();

    const summary = await runExport({ root: storeDir, decryptor, sink });

    expect(summary.total).toBe(5);
    expect(summary.succeeded).toBe(4);
    expect(summary.failed).toBe(1);
    expect(summary.failures).toEqual([
      {
        name: 'email/work',
        code: ExportErrorCode.DECRYPTION_FAILED,
        reason: 'decryption failed',
        detail: 'gpg: Bad passphrase',
      },
    ]);

    const lines = sink.csv().trimEnd().split('\n');
    expect(lines).toHaveLength(5);
    expect(lines.map(line => line.split(',')[0])).toEqual([
      'name', 'bank', 'email/personal', 'social/example.com/alice', 'wifi',
    ]);
  });

  it('wraps unexpected decryptor errors as per-entry failures', async () => {
    const decryptor: Decryptor = {
      name: 'flaky',
      initialize: async () => undefined,
      decrypt: async (entry) => {
        if (entry.name === 'bank') throw new Error('boom');
        return ['pw'];
      },
    };

    const summary = await runExport({ root: storeDir, decryptor, sink: new MemorySink() });
    expect(summary.failures.map(f => [f.name, f.code])).toEqual([['bank', ExportErrorCode.CORRUPT_ENTRY]]);
    expect(summary.succeeded).toBe(4);
  });

  it('produces identical output on repeated runs', async () => {
    const payloads = {
      bank: ['pw-bank', 'login: me'],
      'email/personal': ['pw-mail', 'me@example.com', 'note, with comma'],
    };
    const first = new MemorySink();
    const second = new MemorySink();

    await runExport({ root: storeDir, decryptor: new FakeDecryptor(payloads), sink: first });
    await runExport({ root: storeDir, decryptor: new FakeDecryptor(payloads), sink: second });

    expect(second.csv()).toBe(first.csv());
  });

  it('applies the vault and note separator options', async () => {
    const sink = new MemorySink();
    await runExport({
      root: storeDir,
      decryptor: new FakeDecryptor({ bank: ['pw', 'one', 'two'] }),
      sink,
      vault: 'Imported',
      noteSeparator: ' | ',
    });

    expect(sink.writes[0][0].note).toBe('one | two');
    expect(sink.writes[0].every(row => row.vault === 'Imported')).toBe(true);
  });

  it('aborts before enumerating when the decryption tool is missing', async () => {
    const sink = new MemorySink();
    const decryptor = new FakeDecryptor({}, new ExportError(ExportErrorCode.TOOL_NOT_FOUND, 'gpg not found'));
    const run = new ExportRun();

    await expect(runExport({ root: storeDir, decryptor, sink }, run))
      .rejects.toMatchObject({ code: ExportErrorCode.TOOL_NOT_FOUND });
    expect(decryptor.calls).toEqual([]);
    expect(sink.writes).toEqual([]);
    expect(run.phase).toBe('start');
  });

  it('aborts mid-run on a fatal decryptor error without writing', async () => {
    const sink = new MemorySink();
    const decryptor = new FakeDecryptor({
      'email/personal': new ExportError(ExportErrorCode.TOOL_NOT_FOUND, 'gpg disappeared'),
    });

    await expect(runExport({ root: storeDir, decryptor, sink }))
      .rejects.toMatchObject({ code: ExportErrorCode.TOOL_NOT_FOUND });
    expect(decryptor.calls).toEqual(['bank', 'email/personal']);
    expect(sink.writes).toEqual([]);
  });

  it('fails with ENUMERATION_FAILED when the store is missing', async () => {
    const sink = new MemorySink();
    await expect(runExport({
      root: path.join(storeDir, 'missing'),
      decryptor: new FakeDecryptor({}),
      sink,
    })).rejects.toMatchObject({ code: ExportErrorCode.ENUMERATION_FAILED });
    expect(sink.writes).toEqual([]);
  });

  it('propagates sink failures', async () => {
    const sink: RowSink = {
      location: 'broken',
      write: async () => {
        throw new ExportError(ExportErrorCode.SINK_FAILED, 'disk full');
      },
    };

    await expect(runExport({ root: storeDir, decryptor: new FakeDecryptor({}), sink }))
      .rejects.toMatchObject({ code: ExportErrorCode.SINK_FAILED });
  });

  it('does not write when every entry failed', async () => {
    const payloads: Record<string, Canned> = {};
    for (const name of ['bank', 'email/personal', 'email/work', 'social/example.com/alice', 'wifi']) {
      payloads[name] = badPassphrase(name);
    }
    const sink = new MemorySink();

    const summary = await runExport({ root: storeDir, decryptor: new FakeDecryptor(payloads), sink });

    expect(sink.writes).toEqual([]);
    expect(summary.written).toBe(false);
    expect(summary.output).toBeUndefined();
    expect(summary.failed).toBe(5);
  });

  it('logs entry names and reasons but no field values', async () => {
    const logger = new MemoryLogger();
    await runExport({
      root: storeDir,
      decryptor: new FakeDecryptor({
        bank: ['topsecret-password', 'user: someone'],
        wifi: badPassphrase('wifi'),
      }),
      sink: new MemorySink(),
      logger,
    });

    expect(logger.events[0]).toEqual({ type: 'run_started', store: storeDir });
    expect(logger.events).toContainEqual({ type: 'entry_exported', entry: 'bank' });
    expect(logger.events).toContainEqual({
      type: 'entry_failed',
      entry: 'wifi',
      code: ExportErrorCode.DECRYPTION_FAILED,
      reason: 'decryption failed',
    });
    expect(logger.events[logger.events.length - 1]).toEqual({
      type: 'run_finished',
      total: 5,
      succeeded: 4,
      failed: 1,
      output: 'memory://export.csv',
    });

    const serialized = JSON.stringify(logger.events);
    expect(serialized).not.toContain('topsecret-password');
    expect(serialized).not.toContain('someone');
  });

  it('reports progress for every entry', async () => {
    const progress: string[] = [];
    await runExport({
      root: storeDir,
      decryptor: new FakeDecryptor({ wifi: badPassphrase('wifi') }),
      sink: new MemorySink(),
      onProgress: (event) => progress.push(`${event.index}:${event.name}:${event.ok}`),
    });

    expect(progress).toEqual([
      '1:bank:true',
      '2:email/personal:true',
      '3:email/work:true',
      '4:social/example.com/alice:true',
      '5:wifi:false',
    ]);
  });

  it('leaves the run in the done phase', async () => {
    const run = new ExportRun();
    await runExport({ root: storeDir, decryptor: new FakeDecryptor({}), sink: new MemorySink() }, run);
    expect(run.phase).toBe('done');
  });
});

describe('ExportRun', () => {
  it('moves forward through the phases', () => {
    const run = new ExportRun();
    run.advance('enumerating');
    run.advance('processing');
    expect(run.phase).toBe('processing');
  });

  it('rejects backward and repeated transitions', () => {
    const run = new ExportRun();
    run.advance('processing');
    expect(() => run.advance('enumerating')).toThrow(/Illegal run phase transition/);
    expect(() => run.advance('processing')).toThrow(ExportError);
  });
});

describe('formatSummary', () => {
  it('lists every failed entry with its reason', () => {
    const summary: RunSummary = {
      total: 5,
      succeeded: 4,
      failed: 1,
      failures: [{ name: 'email/work', code: ExportErrorCode.DECRYPTION_FAILED, reason: 'decryption failed', detail: 'x' }],
      written: true,
      output: '/tmp/out.csv',
    };

    expect(formatSummary(summary)).toEqual([
      'Successfully processed 4/5 entries',
      'CSV file written to: /tmp/out.csv',
      'Total entries in CSV: 4',
      '',
      'Failed entries (1):',
      '  email/work: decryption failed',
    ]);
  });

  it('says when nothing was written', () => {
    expect(formatSummary({ total: 0, succeeded: 0, failed: 0, failures: [], written: false })).toEqual([
      'Successfully processed 0/0 entries',
      'No entries were processed successfully; nothing was written',
    ]);
  });
});
