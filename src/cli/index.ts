#!/usr/bin/env node

/**
 * pass-export CLI
 * Migrate a pass password store to a Proton Pass CSV import
 */

import { Command } from 'commander';
import { initCommand } from './commands/init';
import { exportCommand } from './commands/export';
import { listCommand } from './commands/list';
import { logsCommand } from './commands/logs';
import { readFileSync } from 'fs';
import { join } from 'path';

// Read version from package.json
const packageJsonPath = join(__dirname, '../../package.json');
const packageJson: { version?: string } = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
const version = packageJson.version || '0.0.0';

const program = new Command();

program
  .name('pass-export')
  .description('Export a pass password store as a Proton Pass CSV import')
  .version(version);

program
  .command('init')
  .description('Create ~/.pass-export/config.yaml with the default settings')
  .action(initCommand);

program
  .command('export')
  .description('Decrypt every entry and write the Proton Pass CSV')
  .option('-s, --store <dir>', 'Password store root (default: ~/.password-store)')
  .option('-o, --output <file>', 'CSV output path')
  .option('--vault <name>', 'Value for the vault column')
  .option('--backend <type>', 'Decryption backend (gpg|pass)')
  .option('--keygrip <id>', 'Keygrip to preset the passphrase for in gpg-agent')
  .option('--passphrase-from-env <var>', 'Read the passphrase from this environment variable')
  .option('--prompt', 'Ask for the passphrase when none is supplied')
  .option('--json', 'Output the run summary as JSON')
  .action(exportCommand);

program
  .command('list')
  .description('List the entries an export would process (nothing is decrypted)')
  .option('-s, --store <dir>', 'Password store root')
  .option('--json', 'Output as JSON')
  .action(listCommand);

program
  .command('logs')
  .description('View run logs')
  .option('-n, --lines <count>', 'Number of recent events to show', '20')
  .option('--failed', 'Only show failed entries')
  .option('--json', 'Output as JSON')
  .action(logsCommand);

program.parse();
