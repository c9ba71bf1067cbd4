import { RunLogger, type RunEvent } from '../../core/audit';
import { getLogDir } from '../config-yaml';

export function formatEvent(event: RunEvent): string {
  const timestamp = new Date(event.timestamp).toLocaleString();
  switch (event.type) {
    case 'run_started':
      return `${timestamp} run ${event.runId} started (${event.store})`;
    case 'entry_exported':
      return `${timestamp}   \x1b[32mok\x1b[0m     ${event.entry}`;
    case 'entry_failed':
      return `${timestamp}   \x1b[31mfailed\x1b[0m ${event.entry}: ${event.reason}`;
    case 'run_finished':
      return `${timestamp} run ${event.runId} finished: ${event.succeeded}/${event.total} exported, ${event.failed} failed`;
  }
}

export async function logsCommand(options: { lines?: string; failed?: boolean; json?: boolean }): Promise<void> {
  try {
    const logger = new RunLogger(getLogDir());
    const limit = parseInt(options.lines || '20');
    const events = await logger.readLogs({
      limit,
      type: options.failed ? 'entry_failed' : undefined,
    });

    if (options.json) {
      console.log(JSON.stringify({ logs: events.reverse() }, null, 2));
      return;
    }

    if (events.length === 0) {
      console.log('No logs found.');
      console.log('');
      console.log('Logs will appear after an export:');
      console.log('  pass-export export');
      return;
    }

    console.log('');
    console.log(`Recent activity (last ${events.length} events):`);
    console.log('');

    events.reverse().forEach(event => console.log(formatEvent(event)));

    console.log('');

  } catch (error) {
    if (error instanceof Error) {
      if (options.json) {
        console.log(JSON.stringify({ error: error.message }, null, 2));
      } else {
        console.error('❌ Error:', error.message);
      }
    } else {
      if (options.json) {
        console.log(JSON.stringify({ error: 'Unknown error occurred' }, null, 2));
      } else {
        console.error('❌ Unknown error occurred');
      }
    }
    process.exit(1);
  }
}
