import { splitLines } from '../text.js';
import { CHARACTER_FIELDS, type CharacterInfo } from '../types/voicebank.js';

export const RANDOM_SAMPLE = 'Random';

/**
 * Read character.txt positionally: only a line starting with the next
 * expected `field=` is taken and moves the scan on; any other line is
 * skipped. Once `web` is expected the scan stays on it, so a later `web=`
 * line wins. A field that appears out of order is therefore never read, and
 * every field after it keeps its empty default.
 */
export function parseCharacterText(text: string): CharacterInfo {
  const info: CharacterInfo = { name: '', author: '', image: '', sample: '', web: '' };
  const last = CHARACTER_FIELDS.length - 1;
  let index = 0;

  for (const raw of splitLines(text)) {
    const line = raw.trim();
    const field = CHARACTER_FIELDS[index];
    const prefix = `${field}=`;
    if (!line.startsWith(prefix)) continue;
    info[field] = line.slice(prefix.length);
    index = Math.min(index + 1, last);
  }

  if (!info.sample) info.sample = RANDOM_SAMPLE;
  return info;
}
