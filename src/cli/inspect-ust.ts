import { resolve } from 'node:path';
import { loadConfig } from '../config.js';
import { createConsoleLogger } from '../log.js';
import { loadUstFile } from '../ust/parser.js';

function main() {
  const args = process.argv.slice(2);
  if (args.length === 0) {
    console.error('Usage: npx tsx src/cli/inspect-ust.ts <path-to-file.ust>');
    process.exit(1);
  }

  const config = loadConfig(process.env, createConsoleLogger('ust'));
  const ustPath = resolve(args[0]);
  console.log(`Loading UST from: ${ustPath} (${config.encoding})`);

  const result = loadUstFile(ustPath, config);
  if (!result.ok) {
    console.error(`[${result.error.code}] ${result.error.message}`);
    process.exit(1);
  }
  const project = result.value;

  console.log(`\n=== Project: ${project.name} (${project.version || 'no version'}) ===`);
  console.log(`Tempo: ${project.tempo} BPM, tracks: ${project.tracks}`);
  console.log(`VoiceDir: ${project.voiceDir || '-'}`);
  console.log(`Tools: ${project.tools.join(', ') || '-'}`);
  console.log(`Flags: ${project.flags.join(', ') || '-'}`);

  console.log(`\n--- Notes (${project.noteCount}) ---`);
  project.notes.forEach((n, i) => {
    console.log(
      `${String(i).padStart(4)}  ${n.lyric.padEnd(6)} len=${n.length} num=${n.noteNum} ` +
      `vel=${n.velocity} int=${n.intensity} mod=${n.modulation} start=${n.startPoint}`,
    );
  });
}

main();
