import fs from 'fs';
import { getConfigDir, getConfigFile, getLogDir, hasYAMLConfig } from '../config-yaml';

export const EXAMPLE_CONFIG = `# pass-export configuration
# Every field is optional; the values below are the defaults.

version: '0.1.0'

# Password store root (PASSWORD_STORE_DIR overrides this)
store: ~/.password-store

# Proton Pass CSV destination, written once at the end of a run
output: ~/.pass-export/protonpass.csv

# Vault column for every row (empty = Proton Pass default vault)
vault: ''

# Joins note lines of an entry
noteSeparator: "\\n"

decrypt:
  # gpg: decrypt blobs with gpg directly; pass: use \`pass show\`
  backend: gpg
  gpgBinary: gpg
  passBinary: pass
  # Per-entry timeout in milliseconds
  timeout: 30000
  # Environment variable holding the key passphrase
  passphraseEnv: GPG_PASSPHRASE
  # Keygrip to preset the passphrase for (ENCRYPTION_KEYGRIP overrides this)
  # keygrip: 0123456789ABCDEF0123456789ABCDEF01234567
`;

export async function initCommand(): Promise<void> {
  try {
    if (hasYAMLConfig()) {
      console.error('❌ Config already exists at:', getConfigFile());
      console.error('');
      console.error('To start fresh, remove the existing config:');
      console.error(`  rm ${getConfigFile()}`);
      process.exit(1);
    }

    fs.mkdirSync(getConfigDir(), { recursive: true, mode: 0o700 });
    fs.mkdirSync(getLogDir(), { recursive: true, mode: 0o700 });
    fs.writeFileSync(getConfigFile(), EXAMPLE_CONFIG, { mode: 0o600 });

    console.log(`✅ Created ${getConfigFile()}`);
    console.log('');
    console.log('Next steps:');
    console.log('  1. Review the store and output paths');
    console.log('  2. export GPG_PASSPHRASE=... (or pass --prompt)');
    console.log('  3. pass-export export');
  } catch (error) {
    if (error instanceof Error) {
      console.error('❌ Error:', error.message);
    } else {
      console.error('❌ Unknown error occurred');
    }
    process.exit(1);
  }
}
