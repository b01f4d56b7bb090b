import { resolve } from 'node:path';
import { loadConfig } from '../config.js';
import { createConsoleLogger } from '../log.js';
import { formatOtoLine, isDefaultOtoEntry } from '../oto/entry.js';
import { loadVoiceBank } from '../voicebank/loader.js';

function main() {
  const args = process.argv.slice(2);
  if (args.length === 0) {
    console.error('Usage: npx tsx src/cli/inspect-voicebank.ts <voicebank-dir> [alias]');
    process.exit(1);
  }

  const config = loadConfig(process.env, createConsoleLogger('voicebank'));
  const result = loadVoiceBank(resolve(args[0]), config);
  if (!result.ok) {
    console.error(`[${result.error.code}] ${result.error.message}`);
    process.exit(1);
  }
  const bank = result.value;

  console.log(`\n=== Voicebank: ${bank.name || '(unnamed)'} ===`);
  console.log(`Author: ${bank.author || '-'}`);
  console.log(`Web: ${bank.web || '-'}`);
  console.log(`Sample: ${bank.sample}`);
  console.log(`OTO entries: ${bank.otoCount}, sample files: ${bank.fileCount}`);
  for (const [dir, setting] of bank.otoSettings) {
    console.log(`  ${dir}: ${setting.size} entries`);
  }

  const alias = args[1];
  if (alias !== undefined) {
    const entries = bank.findEntries('alias', alias);
    console.log(`\n--- Alias "${alias}" ---`);
    if (entries.length === 1 && isDefaultOtoEntry(entries[0])) {
      console.log('No matching entry');
      return;
    }
    for (const entry of entries) console.log(formatOtoLine(entry));
  }
}

main();
