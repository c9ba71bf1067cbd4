/**
 * Run log for pass-export
 * Records what each export did, one JSONL file per day.
 * Events carry entry names and failure reasons only, never field values.
 */

import fs from 'fs';
import path from 'path';

export type RunEventType = 'run_started' | 'entry_exported' | 'entry_failed' | 'run_finished';

export interface RunEvent {
  id: string;
  timestamp: string;
  type: RunEventType;
  runId: string;
  entry?: string;
  code?: string;
  reason?: string;
  store?: string;
  output?: string;
  total?: number;
  succeeded?: number;
  failed?: number;
}

export type RunEventInput = Omit<RunEvent, 'id' | 'timestamp' | 'runId'>;

/**
 * Minimal sink for run events; the pipeline only needs this much.
 */
export interface RunEventSink {
  record(event: RunEventInput): void;
}

export class RunLogger implements RunEventSink {
  private logDir: string;
  readonly runId: string;

  constructor(logDir: string) {
    this.logDir = logDir;
    this.runId = this.generateId();

    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true, mode: 0o700 });
    }
  }

  /**
   * Current log file path (one file per day)
   */
  private getLogFilePath(): string {
    const date = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
    return path.join(this.logDir, `${date}.jsonl`);
  }

  record(input: RunEventInput): void {
    const event: RunEvent = {
      id: this.generateId(),
      timestamp: new Date().toISOString(),
      runId: this.runId,
      ...input,
    };

    fs.appendFileSync(this.getLogFilePath(), JSON.stringify(event) + '\n', { mode: 0o600 });
  }

  /**
   * Read recent events, newest first.
   */
  async readLogs(options: { limit?: number; type?: RunEventType } = {}): Promise<RunEvent[]> {
    const { limit = 100, type } = options;

    const files = fs.readdirSync(this.logDir)
      .filter(f => f.endsWith('.jsonl'))
      .sort()
      .reverse();

    const events: RunEvent[] = [];

    for (const file of files) {
      const content = fs.readFileSync(path.join(this.logDir, file), 'utf8');
      const lines = content.trim().split('\n').filter(Boolean);

      for (const line of lines.reverse()) {
        let event: RunEvent;
        try {
          event = JSON.parse(line) as RunEvent;
        } catch (error) {
          console.error(`Skipping invalid log line in ${file}:`, (error as Error).message);
          continue;
        }

        if (type && event.type !== type) continue;

        events.push(event);
        if (events.length >= limit) {
          return events;
        }
      }
    }

    return events;
  }

  private generateId(): string {
    return Date.now().toString(36) + Math.random().toString(36).substring(2);
  }
}
