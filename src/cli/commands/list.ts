import { loadYAMLConfig, expandHome } from '../config-yaml';
import { walkStore } from '../../store';

export async function listCommand(options: { store?: string; json?: boolean } = {}): Promise<void> {
  try {
    const config = loadYAMLConfig();
    const storeDir = expandHome(options.store || config.store);

    const entries: string[] = [];
    const unreadable: { name: string; reason: string }[] = [];
    for await (const item of walkStore(storeDir)) {
      if (item.ok) {
        entries.push(item.entry.name);
      } else {
        unreadable.push({ name: item.name, reason: item.error.message });
      }
    }

    if (options.json) {
      console.log(JSON.stringify({ store: storeDir, entries, unreadable }, null, 2));
      return;
    }

    if (entries.length === 0 && unreadable.length === 0) {
      console.log(`No entries found in ${storeDir}`);
      return;
    }

    console.log('');
    console.log(`Entries in ${storeDir}:`);
    for (const name of entries) {
      console.log(`  ${name}`);
    }

    if (unreadable.length > 0) {
      console.log('');
      console.log('Unreadable:');
      for (const item of unreadable) {
        console.log(`  ${item.name}: ${item.reason}`);
      }
    }
    console.log('');
    console.log(`${entries.length + unreadable.length} entries`);

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
