import { password } from '@inquirer/prompts';
import { loadYAMLConfig, resolvePassphrase, expandHome, getLogDir, type ExportConfig, type DecryptBackend } from '../config-yaml';
import { runExport, formatSummary } from '../../core/pipeline';
import { CsvFileSink } from '../../core/serializer';
import { RunLogger } from '../../core/audit';
import { presetPassphrase } from '../../core/preset';
import { createDecryptor, countEntries, ExportError, ExportErrorCode } from '../../store';

export interface ExportCommandOptions {
  store?: string;
  output?: string;
  vault?: string;
  backend?: string;
  keygrip?: string;
  passphraseFromEnv?: string;
  prompt?: boolean;
  json?: boolean;
}

/**
 * Merge command-line flags over the loaded configuration.
 */
export function resolveExportConfig(base: ExportConfig, options: ExportCommandOptions): ExportConfig {
  let backend: DecryptBackend = base.decrypt.backend;
  if (options.backend !== undefined) {
    if (options.backend !== 'gpg' && options.backend !== 'pass') {
      throw new ExportError(
        ExportErrorCode.CONFIG_ERROR,
        `Unknown backend "${options.backend}". Use gpg or pass.`
      );
    }
    backend = options.backend;
  }

  return {
    ...base,
    store: options.store || base.store,
    output: options.output || base.output,
    vault: options.vault ?? base.vault,
    decrypt: {
      ...base.decrypt,
      backend,
      keygrip: options.keygrip || base.decrypt.keygrip,
      passphraseEnv: options.passphraseFromEnv || base.decrypt.passphraseEnv,
    },
  };
}

export async function exportCommand(options: ExportCommandOptions = {}): Promise<void> {
  try {
    const config = resolveExportConfig(loadYAMLConfig(), options);
    const storeDir = expandHome(config.store);
    const outputFile = expandHome(config.output);

    let passphrase = resolvePassphrase(config);
    if (!passphrase && options.prompt) {
      passphrase = await password({ message: 'Enter GPG passphrase:', mask: '*' }) || undefined;
    }

    let keygrip: string | undefined;
    if (passphrase && config.decrypt.keygrip) {
      const preset = await presetPassphrase(config.decrypt.keygrip, passphrase);
      if (preset.ok) {
        keygrip = config.decrypt.keygrip;
        if (!options.json) console.log(`✅ Passphrase preset for keygrip ${keygrip}`);
      } else if (!options.json) {
        console.log(`⚠️  Passphrase preset failed (${preset.error}); falling back to loopback pinentry`);
      }
    }

    const decryptor = createDecryptor(config.decrypt.backend, {
      storeDir,
      binary: config.decrypt.backend === 'pass' ? config.decrypt.passBinary : config.decrypt.gpgBinary,
      passphrase,
      keygrip,
      timeout: config.decrypt.timeout,
    });

    const total = await countEntries(storeDir);
    if (!options.json) {
      console.log(`Found ${total} password entries to process`);
      console.log('');
    }

    const summary = await runExport({
      root: storeDir,
      decryptor,
      sink: new CsvFileSink(outputFile),
      vault: config.vault,
      noteSeparator: config.noteSeparator,
      logger: new RunLogger(getLogDir()),
      onProgress: options.json ? undefined : (event) => {
        const marker = event.ok ? '✅' : '❌';
        console.log(`[${event.index}/${total}] ${marker} ${event.name}`);
      },
    });

    if (options.json) {
      console.log(JSON.stringify({ ok: true, ...summary }, null, 2));
      return;
    }

    console.log('');
    for (const line of formatSummary(summary)) {
      console.log(line);
    }
  } catch (error) {
    const code = error instanceof ExportError ? error.code : undefined;
    if (error instanceof Error) {
      if (options.json) {
        console.log(JSON.stringify({ ok: false, code, error: error.message }, null, 2));
      } else {
        console.error('❌ Error:', error.message);
      }
    } else {
      if (options.json) {
        console.log(JSON.stringify({ ok: false, error: 'Unknown error occurred' }, null, 2));
      } else {
        console.error('❌ Unknown error occurred');
      }
    }
    process.exit(1);
  }
}
