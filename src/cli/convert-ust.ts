import { resolve } from 'node:path';
import { loadConfig } from '../config.js';
import { createConsoleLogger } from '../log.js';
import { saveProject } from '../storage/projectStore.js';
import { loadUstFile } from '../ust/parser.js';

function main() {
  const args = process.argv.slice(2);
  if (args.length === 0) {
    console.error('Usage: npx tsx src/cli/convert-ust.ts <path-to-file.ust> [output-dir]');
    process.exit(1);
  }

  const config = loadConfig(process.env, createConsoleLogger('convert'));
  const parsed = loadUstFile(resolve(args[0]), config);
  if (!parsed.ok) {
    console.error(`[${parsed.error.code}] ${parsed.error.message}`);
    process.exit(1);
  }

  const saved = saveProject(parsed.value, config, { dir: args[1] });
  if (!saved.ok) {
    console.error(`[${saved.error.code}] ${saved.error.message}`);
    process.exit(1);
  }
  console.log(`Wrote ${parsed.value.noteCount} notes to ${saved.value}`);
}

main();
